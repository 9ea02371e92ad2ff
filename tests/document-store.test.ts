import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import {
  loadThreadDocument,
  moveThreadDocument,
  saveThreadDocument,
  writeThreadDocument,
} from "../src/export/document-store.js";
import { renderDocument } from "../src/threads/document-renderer.js";
import { makeRecord } from "./helpers.js";

const NOTE = '---\ntitle: "1004"\ndate: 2020-01-07T08:30:00+00:00\nauthor: "Jane"\ntags: ["threads"]\n---\nJust a note\n';

describe("document store", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "thread-export-docs-"));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  test.each(["@jane", "Jane: Doe", "Jane #1"])("reads back the author %s as written", async (author) => {
    const thread = makeRecord({
      id: "1050118621198921728",
      text: "Hello",
      created: new Date("2018-10-10T20:19:24Z"),
    });

    const written = await writeThreadDocument(thread, renderDocument(thread, { author }), workDir, workDir);
    const document = await loadThreadDocument(written.documentPath);

    expect(path.basename(written.documentPath)).toBe("20181010-1050118621198921728.md");
    expect(document.metadata.author).toBe(author);
    expect(document.metadata.title).toBe("1050118621198921728");
    expect(document.postId).toBe("1050118621198921728");
    expect(document.body).toBe("Hello\n");
  });

  test("saves changed metadata and keeps the body", async () => {
    const filePath = path.join(workDir, "20200107-1004.md");
    await fs.writeFile(filePath, NOTE);

    const document = await loadThreadDocument(filePath);
    await saveThreadDocument({ ...document, metadata: { ...document.metadata, draft: true } });

    expect(await fs.readFile(filePath, "utf-8")).toBe(
      "---\ntitle: '1004'\ndate: 2020-01-07T08:30:00.000Z\nauthor: Jane\ntags:\n  - threads\ndraft: true\n---\nJust a note\n",
    );

    const reloaded = await loadThreadDocument(filePath);
    expect(reloaded.metadata).toEqual({
      title: "1004",
      date: new Date("2020-01-07T08:30:00Z"),
      author: "Jane",
      tags: ["threads"],
      draft: true,
    });
    expect(reloaded.body).toBe("Just a note\n");
  });

  test("moves a single-file document", async () => {
    const filePath = path.join(workDir, "notes", "20200107-1004.md");
    await fs.mkdir(path.dirname(filePath));
    await fs.writeFile(filePath, NOTE);

    const moved = await moveThreadDocument(await loadThreadDocument(filePath), path.join(workDir, "links"));

    expect(moved.filePath).toBe(path.join(workDir, "links", "20200107-1004.md"));
    expect(moved.path).toBe(moved.filePath);
    expect(await fs.readFile(moved.filePath, "utf-8")).toBe(NOTE);
    await expect(fs.access(filePath)).rejects.toThrow();
  });

  test("moves a document folder with its media", async () => {
    const folder = path.join(workDir, "notes", "20200106-1001");
    await fs.mkdir(folder, { recursive: true });
    await fs.writeFile(path.join(folder, "index.md"), NOTE);
    await fs.writeFile(path.join(folder, "1.jpg"), "jpeg-bytes");

    const moved = await moveThreadDocument(
      await loadThreadDocument(path.join(folder, "index.md")),
      path.join(workDir, "links"),
    );

    expect(moved.path).toBe(path.join(workDir, "links", "20200106-1001"));
    expect(moved.filePath).toBe(path.join(workDir, "links", "20200106-1001", "index.md"));
    expect(await fs.readFile(path.join(moved.path, "1.jpg"), "utf-8")).toBe("jpeg-bytes");
    await expect(fs.access(folder)).rejects.toThrow();
  });
});
