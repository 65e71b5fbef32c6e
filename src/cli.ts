/**
 * Command-line interface
 *
 *   variant-id-mapper map [--samples <path>] [--reference <path>] ...
 *   variant-id-mapper inspect <path> [--max-records <n>] ...
 */

import { Command, InvalidArgumentError } from "commander";
import { VariantMapError } from "./errors";
import {
  DEFAULT_INSPECT_OPTIONS,
  DEFAULT_MAP_CONFIG,
  DEFAULT_MAX_KEYS_PRINT,
  formatInspection,
  inspectCorpus,
  mapVariants,
} from "./operations";

export const DEFAULT_PATHS = {
  samples: "data/samples/selected_features.msgpack",
  reference: "data/clinvar/variant_summary.txt.gz",
  out: "data/processed/variant_id_to_chrposrefalt.tsv",
  ambiguousOut: "data/processed/variant_id_to_chrposrefalt_ambiguous.tsv",
} as const;

export interface CliIO {
  readonly out: (line: string) => void;
  readonly err: (line: string) => void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function nonNegativeInteger(value: string): number {
  const trimmed = value.trim();
  if (!/^[0-9]+$/.test(trimmed)) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  const parsed = Number(trimmed);
  if (!Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError("Too large.");
  }
  return parsed;
}

interface MapCommandOptions {
  samples: string;
  reference: string;
  out: string;
  ambiguousOut: string;
  assembly: string;
  maxIds: number;
  idField: string;
}

interface InspectCommandOptions {
  maxRecords: number;
  idField: string;
  idSamples: number;
  labelField: string;
  labelSamples: number;
  maxKeysPrint: number;
}

/**
 * Build the CLI program; `io` receives report and error lines
 *
 * Failures are printed through `io.err` and set `process.exitCode` to 1.
 */
export function createProgram(io: CliIO = consoleIO): Command {
  const program = new Command()
    .name("variant-id-mapper")
    .description("Map sample-corpus variant IDs to chr/pos/ref/alt coordinates")
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    });

  program
    .command("map")
    .description("Resolve sample identifiers against a variant summary table")
    .option("--samples <path>", "Sample corpus (length-prefixed MessagePack records)", DEFAULT_PATHS.samples)
    .option("--reference <path>", "Variant summary TSV, gzip or plain", DEFAULT_PATHS.reference)
    .option("--out <path>", "Unique mapping table", DEFAULT_PATHS.out)
    .option("--ambiguous-out <path>", "Ambiguous mapping table", DEFAULT_PATHS.ambiguousOut)
    .option("--assembly <name>", "Required assembly; empty string disables", DEFAULT_MAP_CONFIG.assembly)
    .option("--max-ids <n>", "Maximum distinct identifiers to collect", nonNegativeInteger, DEFAULT_MAP_CONFIG.maxIds)
    .option("--id-field <name>", "Record field holding the identifier", DEFAULT_MAP_CONFIG.idField)
    .action(async (options: MapCommandOptions) => {
      await runReporting(io, () =>
        mapVariants(
          {
            samplesPath: options.samples,
            referencePath: options.reference,
            uniquePath: options.out,
            ambiguousPath: options.ambiguousOut,
            assembly: options.assembly,
            maxIds: options.maxIds,
            idField: options.idField,
          },
          { report: io.out }
        )
      );
    });

  program
    .command("inspect")
    .description("Summarize the first records of a sample corpus")
    .argument("<path>", "Sample corpus file")
    .option("--max-records <n>", "Records to sample", nonNegativeInteger, DEFAULT_INSPECT_OPTIONS.maxRecords)
    .option("--id-field <name>", "Identifier field to profile", DEFAULT_INSPECT_OPTIONS.idField)
    .option("--id-samples <n>", "Identifier values to show", nonNegativeInteger, DEFAULT_INSPECT_OPTIONS.idSamples)
    .option("--label-field <name>", "Label field to tally", DEFAULT_INSPECT_OPTIONS.labelField)
    .option("--label-samples <n>", "Label values to show", nonNegativeInteger, DEFAULT_INSPECT_OPTIONS.labelSamples)
    .option("--max-keys-print <n>", "Longest key list printed in full", nonNegativeInteger, DEFAULT_MAX_KEYS_PRINT)
    .action(async (path: string, options: InspectCommandOptions) => {
      await runReporting(io, async () => {
        const inspection = await inspectCorpus(path, {
          maxRecords: options.maxRecords,
          idField: options.idField,
          idSamples: options.idSamples,
          labelField: options.labelField,
          labelSamples: options.labelSamples,
          onWarning: (warning) => io.err(`Warning: ${warning}`),
        });
        for (const line of formatInspection(inspection, { maxKeysPrint: options.maxKeysPrint })) {
          io.out(line);
        }
      });
    });

  return program;
}

async function runReporting(io: CliIO, task: () => Promise<unknown>): Promise<void> {
  try {
    await task();
  } catch (error) {
    if (error instanceof VariantMapError) {
      io.err(error.toString());
    } else {
      io.err(error instanceof Error ? `Error: ${error.message}` : `Error: ${String(error)}`);
    }
    process.exitCode = 1;
  }
}
