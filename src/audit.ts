import { log } from "./logger.js";

export type AuditSection =
  | "state"
  | "carve"
  | "ontology"
  | "sources"
  | "promotion";

export interface AuditNote {
  section: AuditSection;
  message: string;
}

/**
 * Collects the guarded no-ops and decisions of a run so they can be rendered
 * into a human-readable log. Nothing in the core throws for bad data; it
 * records a note here instead.
 */
export class AuditLog {
  private readonly notes: AuditNote[] = [];

  note(section: AuditSection, message: string): void {
    this.notes.push({ section, message });
    log.debug(`audit[${section}]: ${message}`);
  }

  /** Same as note(), but also surfaces the message as a warning. */
  warn(section: AuditSection, message: string): void {
    this.notes.push({ section, message });
    log.warn(`${section}: ${message}`);
  }

  entries(section?: AuditSection): AuditNote[] {
    return section ? this.notes.filter((n) => n.section === section) : [...this.notes];
  }

  render(builtAt: Date): string {
    const lines = ["# Audit log", "", `Built: ${builtAt.toISOString()}`, ""];
    const sections: AuditSection[] = ["state", "carve", "ontology", "sources", "promotion"];
    for (const section of sections) {
      const notes = this.entries(section);
      lines.push(`## ${section}`);
      if (notes.length === 0) {
        lines.push("- (none)");
      } else {
        for (const n of notes) lines.push(`- ${n.message}`);
      }
      lines.push("");
    }
    return lines.join("\n");
  }
}

/** Compile a user- or seed-supplied regex; invalid sources are skipped and noted. */
export function compilePattern(
  source: string,
  audit: AuditLog,
  section: AuditSection,
  context: string,
): RegExp | null {
  try {
    return new RegExp(source, "i");
  } catch (err) {
    audit.warn(section, `skipped invalid regex in ${context}: /${source}/ (${String(err)})`);
    return null;
  }
}
