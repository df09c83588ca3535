// CLI command router
import { parseArgs } from "node:util";
import { handleReplay } from "./replay.ts";
import { handleQuality } from "./quality.ts";

export const VERSION = "0.1.0";

export async function run(args: string[]): Promise<void> {
  const { values: flags, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      sink: { type: "string", short: "s" },
      dir: { type: "string", short: "d" },
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
    },
    allowPositionals: true,
  });

  const command = positionals[0];

  if (flags.version) {
    console.log(`bandwatch ${VERSION}`);
    return;
  }

  if (flags.help || !command) {
    printHelp();
    return;
  }

  switch (command) {
    case "version":
      console.log(`bandwatch ${VERSION}`);
      break;

    case "replay":
      await handleReplay({ positionals, config: flags.config, sink: flags.sink, dir: flags.dir });
      break;

    case "quality":
      await handleQuality(positionals);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      printHelp();
      process.exitCode = 1;
  }
}

function printHelp(): void {
  console.log(`bandwatch - indicator snapshot consistency and bias engine

USAGE:
  bandwatch <command> [options]

COMMANDS:
  replay <bars.jsonl>      Replay recorded bars through the engine
  quality <records.jsonl>  Summarize an emitted record file per feed
  version                  Show version

OPTIONS:
  -c, --config <path>      Engine config YAML (default: $BANDWATCH_CONFIG)
  -s, --sink <type>        Override sink: console, jsonl, nats
  -d, --dir <path>         Override JSONL sink directory
  -h, --help               Show help
  -v, --version            Show version
`);
}
