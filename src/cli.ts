import path from "path";
import { UsageError } from "./models/errors";
import { AppContext } from "./context";
import { PhotoMetadataReader, PhotoMetadataWriter } from "./services/photo-metadata";
import { PhotoSync, SyncSummary } from "./services/photo-sync";
import { GenerateSummary, TrackGenerator } from "./services/track-generator";

export type Command = "generate" | "sync" | "pipeline" | "serve";

const COMMANDS: readonly string[] = ["generate", "sync", "pipeline", "serve"];

export interface ParsedArgs {
  command?: Command;
  positionals: string[];
  anonymize: boolean;
  backup: boolean;
  dryRun: boolean;
  help: boolean;
  tolerance?: number;
  port?: number;
}

const isCommand = (value: string): value is Command => COMMANDS.includes(value);

function readNumberOption(name: string, value: string | undefined): number {
  const number = Number(value);
  if (value === undefined || value.trim() === "" || !Number.isFinite(number) || number < 0) {
    throw new UsageError(`--${name} expects a non-negative number`);
  }
  return number;
}

// Parse command line arguments
export function parseArgs(argv: string[]): ParsedArgs {
  const args: ParsedArgs = {
    positionals: [],
    anonymize: false,
    backup: false,
    dryRun: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case "--anonymize":
      case "-a":
        args.anonymize = true;
        continue;
      case "--backup":
      case "-b":
        args.backup = true;
        continue;
      case "--dry-run":
      case "-n":
        args.dryRun = true;
        continue;
      case "--help":
      case "-h":
        args.help = true;
        continue;
      case "--tolerance":
      case "-t":
        args.tolerance = readNumberOption("tolerance", argv[++i]);
        continue;
      case "--port":
      case "-p":
        args.port = readNumberOption("port", argv[++i]);
        continue;
    }

    if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    }

    if (args.command === undefined) {
      if (!isCommand(arg)) {
        throw new UsageError(`Unknown command: ${arg}`);
      }
      args.command = arg;
    } else {
      args.positionals.push(arg);
    }
  }

  return args;
}

// Print usage information
export function printUsage(): void {
  console.log("Usage: photo-geotrack <command> [options]");
  console.log("");
  console.log("Commands:");
  console.log("  generate <photoDir> [outDir]          Build a GPX track from geotagged JPEG photos");
  console.log("  sync <trackFile> <photoDir>           Write track locations onto photos");
  console.log("  pipeline <photoDir> <rawDir> [outDir] Generate a track, then sync it onto rawDir");
  console.log("  serve                                 Start the HTTP API");
  console.log("");
  console.log("Options:");
  console.log("  --anonymize, -a        Replace locations with the centre of their city");
  console.log("  --backup, -b           Keep a <file>.backup copy before writing metadata");
  console.log("  --dry-run, -n          Show what sync would write without modifying files");
  console.log("  --tolerance, -t <s>    Maximum time gap for a sync match (default 3600)");
  console.log("  --port, -p <n>         HTTP port for serve");
  console.log("  --help, -h             Show this help");
  console.log("");
  console.log("Example:");
  console.log("  photo-geotrack generate ./photos/trip ./tracks --anonymize");
}

function requirePositional(args: ParsedArgs, index: number, name: string): string {
  const value = args.positionals[index];
  if (!value) {
    throw new UsageError(`Missing required argument: ${name}`);
  }
  return path.resolve(process.cwd(), value);
}

export async function runGenerate(
  args: ParsedArgs,
  context: AppContext,
  reader: PhotoMetadataReader
): Promise<GenerateSummary> {
  const photoDir = requirePositional(args, 0, "photoDir");
  const outDir = args.positionals[1]
    ? path.resolve(process.cwd(), args.positionals[1])
    : photoDir;

  const generator = new TrackGenerator(reader, context.batch, context.cache);
  const summary = await generator.generate({
    photoDir,
    outDir,
    anonymize: args.anonymize,
  });

  printGenerateSummary(summary, context);
  return summary;
}

export async function runSync(
  args: ParsedArgs,
  context: AppContext,
  reader: PhotoMetadataReader,
  writer: PhotoMetadataWriter
): Promise<SyncSummary> {
  const trackFile = requirePositional(args, 0, "trackFile");
  const photoDir = requirePositional(args, 1, "photoDir");

  const summary = await new PhotoSync(reader, writer).sync({
    trackFile,
    photoDir,
    backup: args.backup,
    dryRun: args.dryRun,
    toleranceSeconds: args.tolerance ?? context.config.syncToleranceSeconds,
  });

  printSyncSummary(summary, args.dryRun);
  return summary;
}

export async function runPipeline(
  args: ParsedArgs,
  context: AppContext,
  reader: PhotoMetadataReader,
  writer: PhotoMetadataWriter
): Promise<SyncSummary> {
  requirePositional(args, 0, "photoDir");
  requirePositional(args, 1, "rawDir");
  const [photoDir, rawDir, outDir] = args.positionals;

  console.log("Step 1/2: generating the GPS track");
  const generated = await runGenerate(
    { ...args, positionals: outDir ? [photoDir, outDir] : [photoDir] },
    context,
    reader
  );

  console.log("Step 2/2: synchronizing the track onto the RAW files");
  return runSync(
    { ...args, positionals: [generated.outputFile, rawDir] },
    context,
    reader,
    writer
  );
}

export function printGenerateSummary(
  summary: GenerateSummary,
  context: AppContext
): void {
  const rate =
    summary.elapsedSeconds > 0
      ? (summary.trackPoints / summary.elapsedSeconds).toFixed(1)
      : "-";
  const resolver = context.resolver.getStats();
  const batch = context.batch.getLastSummary();

  console.log("");
  console.log("Summary:");
  console.log(`  Photos found: ${summary.photosFound}`);
  console.log(`  Track points: ${summary.trackPoints}`);
  console.log(`  Skipped (no EXIF): ${summary.skippedNoExif}`);
  console.log(`  Skipped (no GPS): ${summary.skippedNoGps}`);
  console.log(`  Time: ${summary.elapsedSeconds.toFixed(1)}s (${rate} photos/s)`);
  console.log(
    `  Geocoding: ${resolver.requests} requests, ${batch.fetched} places fetched, ${batch.deduplicated} shared within the batch, ${resolver.fallbacks} raw-coordinate fallbacks`
  );
  if (resolver.anonymized > 0 || resolver.anonymizationFailures > 0) {
    console.log(
      `  Anonymized: ${resolver.anonymized} (${resolver.anonymizationFailures} failed)`
    );
  }
  console.log(`  ${context.cache.formatStats()}`);
  if (!summary.cacheSaved) {
    console.warn("  Cache was not saved, new places will be fetched again next run");
  }
  console.log(`  Output: ${summary.outputFile}`);
}

export function printSyncSummary(summary: SyncSummary, dryRun: boolean): void {
  console.log("");
  console.log(dryRun ? "Summary (dry run, no file modified):" : "Summary:");
  console.log(`  Total photos: ${summary.total}`);
  console.log(`  Synchronized: ${summary.synced}`);
  console.log(`  Skipped (no date): ${summary.skippedNoDate}`);
  console.log(`  Skipped (too far in time): ${summary.skippedTooFar}`);
  console.log(`  Errors: ${summary.errors}`);
}
