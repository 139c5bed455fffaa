import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { basename, join } from "node:path";
import { formatScale } from "@millwork/core";
import { renderShopDrawing } from "@millwork/render-svg";
import { processBatch } from "../batch.js";
import { loadConfig } from "../config-loader.js";
import { errorMessage, isDisplayUnit, printFindings } from "../output.js";
import { buildSummary, logFileName, writeLogs } from "../report.js";

interface GenerateOptions {
  config?: string;
  output: string;
  strict?: boolean;
  units: string;
  width: string;
  dryRun?: boolean;
  verbose?: boolean;
}

export function generateCommand(input: string, options: GenerateOptions): void {
  try {
    if (!isDisplayUnit(options.units)) {
      console.error(`Error: Unknown unit "${options.units}" (expected in, mm or ft-in)`);
      process.exit(2);
    }
    const units = options.units;

    const { config, path: configPath } = loadConfig(options.config);
    if (options.verbose) {
      console.log(`Configuration: ${configPath ?? "built-in defaults"}`);
    }

    const content = readFileSync(input, "utf-8");
    const run = processBatch(content, config, {
      sourceFile: basename(input),
      strict: options.strict,
    });

    if (run.headerFindings.length > 0) {
      printFindings(run.headerFindings);
    }
    if (!run.pipeline) {
      console.error("Error: Input header is missing required columns.");
      process.exit(1);
    }

    const generatedAt = new Date().toISOString();
    const summary = buildSummary({
      inputFile: input,
      configFile: configPath,
      configFingerprint: run.pipeline.configFingerprint,
      inputFingerprint: run.inputFingerprint,
      generatedAt,
      counts: run.counts,
      errorBreakdown: run.errorBreakdown,
      roomLogs: run.roomLogs,
    });

    if (!options.dryRun) {
      const logDir = writeLogs(options.output, run.roomLogs, summary);
      if (options.verbose) console.log(`Logs: ${logDir}`);
    }

    const { total, accepted, rejected } = run.counts;
    if (options.verbose || rejected > 0) {
      console.log("Validation summary:");
      console.log(`  Total rooms:    ${total}`);
      console.log(`  Accepted rooms: ${accepted}`);
      console.log(`  Rejected rooms: ${rejected}`);
      if (total > 0) {
        console.log(`  Success rate:   ${(run.counts.successRate * 100).toFixed(1)}%`);
      }
    }

    if (rejected > 0) {
      console.warn(
        `Warning: ${rejected} room(s) rejected. See ${join(options.output, "logs")}/`,
      );
      if (options.verbose) {
        for (const log of run.roomLogs) {
          if (log.status === "failed") {
            console.warn(`  ${log.roomId}: ${log.errors.length} error(s) → ${logFileName(log.roomId)}`);
          }
        }
      }
      if (options.strict) {
        console.error("Strict mode: stopping due to rejected rooms.");
        process.exit(1);
      }
    }

    if (run.layouts.length === 0) {
      console.error("Error: No valid rooms to draw.");
      process.exit(1);
    }

    if (options.dryRun) {
      console.log(`Dry run: ${run.layouts.length} room(s) ready to draw. No files written.`);
      return;
    }

    mkdirSync(options.output, { recursive: true });
    const width = parseInt(options.width, 10);
    for (const layout of run.layouts) {
      const svg = renderShopDrawing(layout, {
        width: Number.isFinite(width) && width > 0 ? width : undefined,
        units,
        precision: config.TOLERANCES.LENGTH_ROUNDING,
        scale: formatScale(config.SCALE_PLAN),
        codeBasis: config.CODE?.BASIS,
        page: config.PAGE,
      });
      const outputPath = join(options.output, `${layout.roomId}.svg`);
      writeFileSync(outputPath, svg, "utf-8");
      if (options.verbose) console.log(`Rendered: ${outputPath}`);
    }

    console.log(`Generated ${run.layouts.length} drawing(s) in ${options.output}`);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(2);
  }
}
