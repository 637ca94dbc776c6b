import { mkdirSync } from "fs";
import { writeFile } from "fs/promises";
import { join } from "path";

export interface UploadedFile {
  filename: string;
  data: Buffer;
}

/** YYYYMMDD-HHMMSSmmm in local time. */
export function timestampName(date: Date): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}` +
    pad(date.getMilliseconds(), 3)
  );
}

/**
 * Writes uploaded images as-is under a timestamp-derived `.jpg` name.
 *
 * Names have millisecond resolution: two uploads in the same millisecond get
 * the same name and the later write replaces the earlier file. Replaced or
 * superseded files are never removed.
 */
export class ImageStore {
  constructor(
    private readonly dir: string,
    private readonly urlPrefix: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  ensureDir(): void {
    mkdirSync(this.dir, { recursive: true });
  }

  async save(upload: UploadedFile): Promise<string> {
    const filename = `${timestampName(this.clock())}.jpg`;
    await writeFile(join(this.dir, filename), upload.data);
    return `${this.urlPrefix}/${filename}`;
  }
}
