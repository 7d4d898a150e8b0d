import fs from "node:fs/promises";
import path from "node:path";
import type { Book } from "../types/core";
import type { BookTextSource } from "./interfaces";

/** Reads uploaded plain-text files relative to the upload root. */
export class FileBookTextSource implements BookTextSource {
  constructor(private readonly rootDir: string) {}

  async loadText(book: Book): Promise<string | null> {
    if (!book.filePath) return null;
    const root = path.resolve(this.rootDir);
    const resolved = path.resolve(root, book.filePath);
    if (resolved !== root && !resolved.startsWith(`${root}${path.sep}`)) {
      throw new Error(`Book file path escapes the upload root: ${book.filePath}`);
    }
    try {
      return await fs.readFile(resolved, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return null;
      throw error;
    }
  }
}
