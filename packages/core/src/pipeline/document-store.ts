import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

import type { HomeworkDocument } from "./document.js";
import { serializeDocument } from "./document.js";

/** Where the load pipeline reads from. `null` means the document does not exist. */
export interface DocumentSource {
  describe(): string;
  read(): Promise<string | null>;
}

export interface DocumentSink {
  write(document: HomeworkDocument): Promise<void>;
}

export class HomeworkDocumentStore implements DocumentSource, DocumentSink {
  constructor(private readonly filePath: string) {}

  describe(): string {
    return this.filePath;
  }

  async read(): Promise<string | null> {
    try {
      return await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return null;
      }
      throw error;
    }
  }

  async write(document: HomeworkDocument): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFileAtomically(this.filePath, serializeDocument(document));
  }
}

async function writeFileAtomically(targetPath: string, payload: string): Promise<void> {
  const directory = path.dirname(targetPath);
  const tempPath = path.join(
    directory,
    `.${path.basename(targetPath)}.tmp-${process.pid}-${Date.now()}-${randomUUID()}`
  );
  await fs.writeFile(tempPath, payload, "utf8");
  await fs.rename(tempPath, targetPath);
}
