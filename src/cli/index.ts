#!/usr/bin/env npx tsx

/**
 * Library command line.
 *
 * Usage:
 *   npx tsx src/cli/index.ts list
 *   npx tsx src/cli/index.ts import ./notes
 *   npx tsx src/cli/index.ts analyze "My Book" TF-IDF
 *
 * Configuration comes from LIBRARY_* / LIBSQL_* environment variables.
 */

import { loadLibraryConfig } from "@/lib/config";
import { isLibraryError } from "@/lib/errors";
import { createLibraryService } from "@/lib/libraryService";
import { USAGE, parseCommand, runCommand } from "./commands";

async function main(): Promise<void> {
  const parsed = parseCommand(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const service = await createLibraryService(loadLibraryConfig());
  try {
    process.exitCode = await runCommand(service, parsed.command, (line) => console.log(line));
  } finally {
    await service.close();
  }
}

main().catch((error) => {
  if (isLibraryError(error)) {
    console.error(`Error [${error.code}]: ${error.message}`);
  } else {
    console.error("Error:", error);
  }
  process.exit(1);
});
