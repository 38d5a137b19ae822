#!/usr/bin/env node
import { Server } from "http";
import { createApp } from "./app";
import { ParsedArgs, parseArgs, printUsage, runGenerate, runPipeline, runSync } from "./cli";
import { loadConfig } from "./config";
import { AppContext, createContext } from "./context";
import { UsageError } from "./models/errors";
import { ExifrMetadataReader } from "./services/exif-reader";
import { ExiftoolMetadataWriter } from "./services/exif-writer";

async function runCommand(args: ParsedArgs, context: AppContext): Promise<void> {
  const reader = new ExifrMetadataReader();

  if (args.command === "generate") {
    await runGenerate(args, context, reader);
    return;
  }

  const writer = new ExiftoolMetadataWriter();
  try {
    if (args.command === "sync") {
      await runSync(args, context, reader, writer);
    } else {
      await runPipeline(args, context, reader, writer);
    }
  } finally {
    await writer.close();
  }
}

function serve(args: ParsedArgs, context: AppContext): Server {
  const port = args.port ?? context.config.port;
  const app = createApp({
    cache: context.cache,
    resolver: context.resolver,
    batch: context.batch,
    toleranceSeconds: context.config.syncToleranceSeconds,
  });

  const server = app.listen(port, () => {
    console.log(`Server is running on port ${port}`);
    console.log(`API endpoints:`);
    console.log(`- GET http://localhost:${port}/api/geo/reverse?lat={lat}&lon={lon}`);
    console.log(`- POST http://localhost:${port}/api/geo/batch`);
    console.log(`- GET http://localhost:${port}/api/geo/cache/stats`);
    console.log(`- POST http://localhost:${port}/api/track/match`);
    console.log(`- GET http://localhost:${port}/health`);
  });

  // Clean shutdown function
  const shutdown = async () => {
    console.log("Shutting down gracefully...");

    try {
      server.close();
      await context.cache.save();
      await context.close();
    } catch (err) {
      console.error("Error during shutdown:", err);
    }

    process.exit(0);
  };

  // Listen for termination signals to close connections
  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());

  return server;
}

// Main function
async function main(): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      printUsage();
      return 1;
    }
    throw error;
  }

  if (args.help || !args.command) {
    printUsage();
    return args.help ? 0 : 1;
  }

  const context = await createContext(loadConfig());

  if (args.command === "serve") {
    serve(args, context);
    return 0;
  }

  try {
    await runCommand(args, context);
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    console.error("Unexpected error:", error);
    return 1;
  } finally {
    await context.close();
  }
}

main().then(
  (code) => {
    // A running server keeps the process alive on its own
    process.exitCode = code;
  },
  (err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  }
);
