import type { Book } from "@/types/book";
import { formatSearchMatch } from "@/lib/bookUtils";
import type { ImportReport, LibraryService } from "@/lib/libraryService";
import { extractSnippet } from "@/lib/searchUtils";

export const USAGE = `Usage: page-library <command> [arguments]

Commands:
  list                        List every book
  show <title>                Print a book page by page
  import <path>               Import a book file or every book file under a directory
  export <title>              Write a library book to the library directory
  delete <title|file>         Delete a book file, or a library book by title
  search <text>               Search page content
  search-title <text>         Search by title
  analyze <title> <method>    Run Paper, PMI, PKL, TF-IDF or Transliteration
  can-write <title>           Check write access for the acting user
  add-page <title> <content>  Append a page to a book
  status                      Show whether the primary backend is reachable
  sync                        Push books written while offline to the primary backend
  help                        Show this message`;

export type Command =
  | { name: "list" }
  | { name: "show"; title: string }
  | { name: "import"; path: string }
  | { name: "export"; title: string }
  | { name: "delete"; value: string }
  | { name: "search"; text: string }
  | { name: "search-title"; text: string }
  | { name: "analyze"; title: string; method: string }
  | { name: "can-write"; title: string }
  | { name: "add-page"; title: string; content: string }
  | { name: "status" }
  | { name: "sync" }
  | { name: "help" };

export type ParseResult =
  | { ok: true; command: Command }
  | { ok: false; error: string };

function missing(command: string, argument: string): ParseResult {
  return { ok: false, error: `Missing <${argument}> for "${command}"` };
}

/**
 * Parse command-line arguments (without the node and script paths).
 */
export function parseCommand(args: string[]): ParseResult {
  const [name = "help", first, ...rest] = args;

  switch (name) {
    case "list":
    case "status":
    case "sync":
    case "help":
      return { ok: true, command: { name } };
    case "show":
    case "export":
    case "can-write":
      return first ? { ok: true, command: { name, title: first } } : missing(name, "title");
    case "import":
      return first ? { ok: true, command: { name, path: first } } : missing(name, "path");
    case "delete":
      return first ? { ok: true, command: { name, value: first } } : missing(name, "title|file");
    case "search":
    case "search-title": {
      const text = [first, ...rest].filter((part) => part !== undefined).join(" ");
      return text ? { ok: true, command: { name, text } } : missing(name, "text");
    }
    case "analyze":
      if (!first) return missing(name, "title");
      if (!rest[0]) return missing(name, "method");
      return { ok: true, command: { name, title: first, method: rest[0] } };
    case "add-page": {
      if (!first) return missing(name, "title");
      const content = rest.join(" ");
      return content ? { ok: true, command: { name, title: first, content } } : missing(name, "content");
    }
    default:
      return { ok: false, error: `Unknown command: ${name}` };
  }
}

function describeReport(report: ImportReport): string {
  const batches = report.batches.length > 0 ? ` (batches: ${report.batches.join(", ")})` : "";
  return `Imported ${report.imported}, skipped ${report.skipped}, failed ${report.failed}${batches}`;
}

function describeBook(book: Book): string {
  const pages = book.pages?.length ?? 0;
  return `${book.title} (${pages} ${pages === 1 ? "page" : "pages"}, author: ${book.authorId ?? "none"})`;
}

/**
 * Run one command against the service. Returns the process exit code.
 */
export async function runCommand(
  service: LibraryService,
  command: Command,
  print: (line: string) => void
): Promise<number> {
  switch (command.name) {
    case "help":
      print(USAGE);
      return 0;

    case "list": {
      const books = await service.getAll();
      if (books.length === 0) print("The library is empty");
      for (const book of books) print(describeBook(book));
      return 0;
    }

    case "show": {
      const book = await service.getByTitle(command.title);
      if (!book) {
        print(`Book not found: ${command.title}`);
        return 1;
      }
      print(describeBook(book));
      for (const page of book.pages ?? []) {
        print(`--- Page ${page.pageNumber} ---`);
        print(page.content);
      }
      return 0;
    }

    case "import": {
      print(describeReport(await service.importBook(command.path)));
      return 0;
    }

    case "export": {
      const exported = await service.exportBook(command.title);
      print(exported ? `Exported ${command.title}` : `Export failed: ${command.title}`);
      return exported ? 0 : 1;
    }

    case "delete": {
      const deleted = await service.deleteBook(command.value);
      print(deleted ? `Deleted ${command.value}` : `Nothing deleted: ${command.value}`);
      return deleted ? 0 : 1;
    }

    case "search":
    case "search-title": {
      const matches =
        command.name === "search"
          ? await service.searchByContent(command.text)
          : await service.searchByTitle(command.text);
      if (matches.length === 0) print("No matches");
      for (const match of matches) {
        print(formatSearchMatch({ ...match, content: extractSnippet(match.content, command.text) }));
      }
      return 0;
    }

    case "analyze": {
      const book = await service.getByTitle(command.title);
      if (!book) {
        print(`Book not found: ${command.title}`);
        return 1;
      }
      print(await service.analyze(book, command.method));
      return 0;
    }

    case "can-write": {
      const allowed = await service.hasWritePrivileges(command.title);
      print(allowed ? "yes" : "no");
      return 0;
    }

    case "add-page": {
      const book = await service.getByTitle(command.title);
      const pageNumber = (book?.pages?.length ?? 0) + 1;
      const added = await service.addPage(command.title, {
        id: 0,
        bookId: 0,
        pageNumber,
        content: command.content,
      });
      print(added ? `Added page ${pageNumber} to ${command.title}` : `Could not add page to ${command.title}`);
      return added ? 0 : 1;
    }

    case "status": {
      const connected = await service.isBackendConnected();
      print(`Environment: ${service.getEnvironment()}`);
      print(connected ? "Primary backend reachable" : "Primary backend unreachable, using library directory");
      return 0;
    }

    case "sync": {
      print(describeReport(await service.syncDegradedBooks()));
      return 0;
    }
  }
}
