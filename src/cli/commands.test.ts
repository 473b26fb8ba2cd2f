import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import path from "path";
import { USAGE, parseCommand, runCommand, type Command } from "./commands";
import { LibraryService } from "@/lib/libraryService";
import { FileStorageBackend } from "@/lib/storageBackend/FileStorageBackend";
import { InMemoryStorageBackend } from "@/lib/storageBackend/InMemoryStorageBackend";
import { silenceConsole } from "@/test/mocks";
import { createTestBook, createTestDirectory } from "@/test/testDatabase";

describe("parseCommand", () => {
  it("should default to help", () => {
    expect(parseCommand([])).toEqual({ ok: true, command: { name: "help" } });
  });

  it("should parse commands with arguments", () => {
    expect(parseCommand(["show", "Diwan"])).toEqual({
      ok: true,
      command: { name: "show", title: "Diwan" },
    });
    expect(parseCommand(["import", "./notes"])).toEqual({
      ok: true,
      command: { name: "import", path: "./notes" },
    });
    expect(parseCommand(["analyze", "Diwan", "PMI"])).toEqual({
      ok: true,
      command: { name: "analyze", title: "Diwan", method: "PMI" },
    });
  });

  it("should join the remaining words of free text", () => {
    expect(parseCommand(["search", "date", "palm"])).toEqual({
      ok: true,
      command: { name: "search", text: "date palm" },
    });
    expect(parseCommand(["add-page", "Diwan", "new", "verse"])).toEqual({
      ok: true,
      command: { name: "add-page", title: "Diwan", content: "new verse" },
    });
  });

  it("should report missing arguments", () => {
    expect(parseCommand(["export"])).toEqual({
      ok: false,
      error: 'Missing <title> for "export"',
    });
    expect(parseCommand(["analyze", "Diwan"])).toEqual({
      ok: false,
      error: 'Missing <method> for "analyze"',
    });
  });

  it("should reject unknown commands", () => {
    expect(parseCommand(["frobnicate"])).toEqual({
      ok: false,
      error: "Unknown command: frobnicate",
    });
  });
});

describe("runCommand", () => {
  let cleanup: () => Promise<void>;
  let service: LibraryService;
  let lines: string[];

  async function run(command: Command): Promise<number> {
    return runCommand(service, command, (line) => lines.push(line));
  }

  beforeEach(async () => {
    silenceConsole();
    const created = await createTestDirectory();
    cleanup = created.cleanup;
    const fileBackend = new FileStorageBackend(path.join(created.directory, "library"));
    await fileBackend.connect();
    service = new LibraryService({
      primary: new InMemoryStorageBackend(),
      fileBackend,
      userId: "test-user",
    });
    lines = [];
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await cleanup();
  });

  it("should print usage for help", async () => {
    expect(await run({ name: "help" })).toBe(0);
    expect(lines).toEqual([USAGE]);
  });

  it("should list books", async () => {
    await run({ name: "list" });
    await service.insertBook(createTestBook("Diwan"));
    await run({ name: "list" });

    expect(lines).toEqual(["The library is empty", "Diwan (2 pages, author: test-user)"]);
  });

  it("should show a book page by page", async () => {
    await service.insertBook(createTestBook("Diwan", ["first verse"]));

    expect(await run({ name: "show", title: "Diwan" })).toBe(0);
    expect(lines).toEqual(["Diwan (1 page, author: test-user)", "--- Page 1 ---", "first verse"]);
  });

  it("should fail for a missing book", async () => {
    expect(await run({ name: "show", title: "Missing" })).toBe(1);
    expect(lines).toEqual(["Book not found: Missing"]);
  });

  it("should print search matches", async () => {
    await service.insertBook(createTestBook("Oasis", ["palm trees"]));

    await run({ name: "search", text: "palm" });
    await run({ name: "search-title", text: "cactus" });

    expect(lines).toEqual(["Title: Oasis, Page: 1, Content: palm trees", "No matches"]);
  });

  it("should add a page after the last one", async () => {
    await service.insertBook(createTestBook("Diwan"));

    expect(await run({ name: "add-page", title: "Diwan", content: "third" })).toBe(0);
    expect(lines).toEqual(["Added page 3 to Diwan"]);
  });

  it("should answer can-write", async () => {
    await service.insertBook(createTestBook("Mine"));

    await run({ name: "can-write", title: "Mine" });
    await run({ name: "can-write", title: "Missing" });

    expect(lines).toEqual(["yes", "no"]);
  });

  it("should report status", async () => {
    await run({ name: "status" });
    expect(lines).toEqual(["Environment: connected", "Primary backend reachable"]);
  });

  it("should export and then delete", async () => {
    await service.insertBook(createTestBook("Diwan"));

    expect(await run({ name: "export", title: "Diwan" })).toBe(0);
    expect(await run({ name: "delete", value: "Diwan" })).toBe(0);
    expect(await run({ name: "delete", value: "Diwan" })).toBe(1);
    expect(lines).toEqual(["Exported Diwan", "Deleted Diwan", "Nothing deleted: Diwan"]);
  });

  it("should print an analysis report", async () => {
    await service.insertBook(createTestBook("City", ["new york new york big apple"]));

    await run({ name: "analyze", title: "City", method: "Paper" });
    expect(lines).toEqual(['Paper report for "City"\n  new york: 4']);
  });

  it("should summarize sync results", async () => {
    await run({ name: "sync" });
    expect(lines).toEqual(["Imported 0, skipped 0, failed 0"]);
  });
});
