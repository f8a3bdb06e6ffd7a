import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { LocalFsBackend } from "../src/backend/local.js";
import { SharedFsBackend, isTransientFsError } from "../src/backend/shared.js";
import { AlreadyExistsError, NotFoundError, ValidationError } from "../src/errors.js";
import { createTempRoot } from "./helpers.js";

const bytes = (text: string): Buffer => Buffer.from(text, "utf8");

describe("LocalFsBackend", () => {
  it("creates a file once and refuses to overwrite it", async () => {
    const root = await createTempRoot("local");
    const backend = new LocalFsBackend(root);

    await backend.writeNew("a/b/file.txt", bytes("first"));
    await expect(backend.writeNew("a/b/file.txt", bytes("second"))).rejects.toBeInstanceOf(AlreadyExistsError);

    expect((await backend.readAll("a/b/file.txt")).toString("utf8")).toBe("first");
    expect(await readdir(path.join(root, "a", "b"))).toEqual(["file.txt"]);
  });

  it("reports missing paths", async () => {
    const backend = new LocalFsBackend(await createTempRoot("local"));
    expect(await backend.exists("nope")).toBe(false);
    expect(await backend.listChildren("nope")).toEqual([]);
    await expect(backend.readAll("nope")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("lists children sorted, without hidden bookkeeping", async () => {
    const root = await createTempRoot("local");
    const backend = new LocalFsBackend(root);
    await mkdir(path.join(root, "dir", ".staging"), { recursive: true });
    await writeFile(path.join(root, "dir", "b"), "");
    await writeFile(path.join(root, "dir", "a"), "");
    await writeFile(path.join(root, "dir", ".tmp"), "");

    expect(await backend.listChildren("dir")).toEqual(["a", "b"]);
  });

  it("replaces a file atomically", async () => {
    const root = await createTempRoot("local");
    const backend = new LocalFsBackend(root);
    await backend.writeAtomic("aliases/prod.json", bytes("one"));
    await backend.writeAtomic("aliases/prod.json", bytes("two"));

    expect(await readFile(path.join(root, "aliases", "prod.json"), "utf8")).toBe("two");
    expect(await readdir(path.join(root, "aliases"))).toEqual(["prod.json"]);
  });

  it("commits a staging directory and refuses a second commit", async () => {
    const root = await createTempRoot("local");
    const backend = new LocalFsBackend(root);
    await backend.writeNew(".staging/one/file", bytes("1"));
    await backend.writeNew(".staging/two/file", bytes("2"));

    await backend.commitDirectory(".staging/one", "final/v1");
    await expect(backend.commitDirectory(".staging/two", "final/v1")).rejects.toBeInstanceOf(AlreadyExistsError);

    expect((await backend.readAll("final/v1/file")).toString("utf8")).toBe("1");
    expect(await backend.exists(".staging/one")).toBe(false);
    expect(await backend.exists(".staging/two")).toBe(true);

    // a staging key that names nothing is not mistaken for an earlier commit
    await expect(backend.commitDirectory(".staging/one", "final/v1")).rejects.toBeInstanceOf(AlreadyExistsError);
  });

  it("appends whole lines", async () => {
    const root = await createTempRoot("local");
    const backend = new LocalFsBackend(root);
    await Promise.all(
      Array.from({ length: 20 }, (_, i) => backend.appendLine("log/x.jsonl", bytes(`${JSON.stringify({ i })}\n`))),
    );
    const lines = (await readFile(path.join(root, "log", "x.jsonl"), "utf8")).trimEnd().split("\n");
    expect(lines).toHaveLength(20);
    expect(new Set(lines).size).toBe(20);
    for (const line of lines) expect(line).toMatch(/^\{"i":\d+\}$/);
  });

  it("removes files and trees", async () => {
    const backend = new LocalFsBackend(await createTempRoot("local"));
    await backend.writeNew("tree/a/b", bytes("x"));
    await backend.remove("tree");
    expect(await backend.exists("tree")).toBe(false);
    await backend.remove("tree");
  });

  it.each(["../escape", "a/../../b", "a//b", "a/./b", "a\\b"])("rejects unsafe key %j", async (key) => {
    const backend = new LocalFsBackend(await createTempRoot("local"));
    expect(() => backend.locate(key)).toThrow(ValidationError);
  });
});

describe("SharedFsBackend", () => {
  it("keeps the local contracts", async () => {
    const root = await createTempRoot("shared");
    const backend = new SharedFsBackend(root);
    expect(backend.kind).toBe("shared");

    await backend.writeNew("x/file", bytes("1"));
    await expect(backend.writeNew("x/file", bytes("2"))).rejects.toBeInstanceOf(AlreadyExistsError);
    await backend.writeAtomic("x/alias.json", bytes("{}"));
    expect(await backend.listChildren("x")).toEqual(["alias.json", "file"]);
  });

  it("classifies network filesystem errno values as transient", () => {
    const errno = (code: string): Error => Object.assign(new Error(code), { code });
    expect(isTransientFsError(errno("ESTALE"))).toBe(true);
    expect(isTransientFsError(errno("EAGAIN"))).toBe(true);
    expect(isTransientFsError(errno("ENOENT"))).toBe(false);
    expect(isTransientFsError(new Error("plain"))).toBe(false);
  });
});
