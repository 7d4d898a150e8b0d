import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Book } from "../types/core";
import { FileBookTextSource } from "./fileTextSource";

function book(filePath: string | null): Book {
  return {
    id: "b1",
    title: "Dune",
    author: "Frank Herbert",
    isbn: null,
    genres: [],
    filePath,
    summary: null,
    reviewConsensus: null,
    consensusVersion: 0,
    createdAt: "2026-01-01T00:00:00.000Z",
  };
}

async function withUploadRoot(run: (root: string) => Promise<void>): Promise<void> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "library-uploads-"));
  try {
    await run(root);
  } finally {
    await fs.rm(root, { recursive: true, force: true });
  }
}

test("reads text relative to the upload root", async () => {
  await withUploadRoot(async (root) => {
    await fs.mkdir(path.join(root, "books"));
    await fs.writeFile(path.join(root, "books", "dune.txt"), "Sand and spice.", "utf8");
    const source = new FileBookTextSource(root);
    assert.equal(await source.loadText(book("books/dune.txt")), "Sand and spice.");
  });
});

test("missing files and books without a path yield null", async () => {
  await withUploadRoot(async (root) => {
    const source = new FileBookTextSource(root);
    assert.equal(await source.loadText(book("absent.txt")), null);
    assert.equal(await source.loadText(book(null)), null);
  });
});

test("paths escaping the upload root are refused", async () => {
  await withUploadRoot(async (root) => {
    const source = new FileBookTextSource(root);
    await assert.rejects(source.loadText(book("../outside.txt")), /escapes the upload root/);
  });
});
