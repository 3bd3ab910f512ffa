import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import ical from "node-ical";
import { PublishError, toError } from "../types/errors";
import { withSource } from "../logger";

const log = withSource("calendar-store");

export interface StoredEvent {
  uid: string;
  summary: string;
  start: Date;
  end: Date;
  location: string;
  description: string;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// node-ical hands back either the bare text or { params, val } for properties with parameters.
function propertyText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "object" && value !== null && "val" in value) return String(value.val);
  return "";
}

/**
 * Parse an iCalendar document back into its events, sorted by start.
 */
export function readEvents(text: string): StoredEvent[] {
  const components = ical.sync.parseICS(text);
  const events: StoredEvent[] = [];
  for (const key of Object.keys(components)) {
    const component = components[key];
    if (!component || component.type !== "VEVENT") continue;
    events.push({
      uid: component.uid || key,
      summary: propertyText(component.summary),
      start: new Date(component.start),
      end: component.end ? new Date(component.end) : new Date(component.start),
      location: propertyText(component.location),
      description: propertyText(component.description),
    });
  }
  return events.sort((a, b) => a.start.getTime() - b.start.getTime());
}

/**
 * The published calendar file. Writes replace it whole through a temp file
 * and a rename, so readers never see a half-written calendar.
 */
export class CalendarStore {
  constructor(readonly filePath: string) {}

  async write(content: string): Promise<void> {
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(tmpPath, content, "utf8");
      await rename(tmpPath, this.filePath);
    } catch (err) {
      throw new PublishError(`Cannot write calendar file: ${toError(err).message}`, { file: this.filePath });
    }
    log.info({ file: this.filePath, bytes: Buffer.byteLength(content, "utf8") }, "calendar written");
  }

  /**
   * @returns The calendar text, or null when nothing has been published yet
   */
  async read(): Promise<string | null> {
    try {
      return await readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }
}
