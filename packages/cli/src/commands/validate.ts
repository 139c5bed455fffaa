import { readFileSync } from "node:fs";
import { basename } from "node:path";
import { processBatch } from "../batch.js";
import { loadConfig } from "../config-loader.js";
import { errorMessage, printFindings } from "../output.js";

interface ValidateOptions {
  config?: string;
  strict?: boolean;
}

export function validateCommand(input: string, options: ValidateOptions): void {
  try {
    const { config } = loadConfig(options.config);
    const content = readFileSync(input, "utf-8");
    const run = processBatch(content, config, {
      sourceFile: basename(input),
      strict: options.strict,
    });

    if (run.headerFindings.length > 0) {
      printFindings(run.headerFindings);
    }
    if (!run.pipeline) {
      console.error("\nInput header is missing required columns.");
      process.exit(1);
    }

    if (run.roomLogs.length === 0) {
      console.log(`✓ ${run.counts.total} room(s) valid. No issues found.`);
      return;
    }

    let errorCount = 0;
    let warningCount = 0;
    for (const log of run.roomLogs) {
      console.log(`\n${log.roomId} (${log.status})`);
      for (const err of log.errors) {
        errorCount++;
        console.error(`  ✗ [${err.code}] ${err.field}: ${err.message}`);
      }
      for (const warn of log.warnings) {
        warningCount++;
        console.warn(`  ⚠ [${warn.code}] ${warn.field}: ${warn.message}`);
      }
    }

    const { total, accepted, rejected } = run.counts;
    console.log(
      `\nSummary: ${accepted}/${total} room(s) accepted, ${rejected} rejected; ${errorCount} error(s), ${warningCount} warning(s)`,
    );

    if (rejected > 0) {
      process.exit(1);
    }
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(2);
  }
}
