import type { Readable } from "stream";
import { pathToFileURL } from "url";
import { collectPerFrame, collectUniqueKeys, encodeNonFiniteNumbers } from "@shared/frame-aggregation";
import { buildViews, collectRequestedKeys } from "@shared/views";
import { renderViews } from "@shared/table-format";
import { describeError } from "@shared/errors";
import { loadFrameSources } from "../server/stream-utils";
import { FrameStore } from "../server/frame-store";
import { startServer } from "../server/index";
import { log, setLogWriter } from "../server/log";
import { CliUsageError, USAGE, parseCliArgs, toViewRequest } from "./cli-options";

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  stdin?: Readable;
};

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/** Runs one invocation and returns the process exit code. */
export async function runCli(argv: readonly string[], io: CliIo = defaultIo): Promise<number> {
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      io.stdout(USAGE);
      return 0;
    }
    setLogWriter((line) => io.stderr(`${line}\n`));

    const sources = await loadFrameSources({
      paths: options.paths,
      stdin: io.stdin,
      onLoaded: (source) => {
        log(
          `${source.name}: ${source.frames.length} frames from ${source.lineCount} lines`,
          "reader",
        );
      },
    });

    const keys = collectUniqueKeys(sources);
    const request = toViewRequest(options);
    const frames = collectPerFrame({
      sources,
      keys: [...new Set([...keys, ...collectRequestedKeys(request)])],
      beginFrame: options.beginFrame,
      endFrame: options.endFrame,
    });

    if (options.printKeys) {
      keys.forEach((key) => io.stdout(`${key}\n`));
    }

    const views = buildViews(frames, request);
    if (views.length > 0) {
      io.stdout(
        options.json ? `${JSON.stringify({ views }, encodeNonFiniteNumbers, 2)}\n` : `${renderViews(views)}\n`,
      );
    }

    if (options.serve) {
      await startServer(new FrameStore(sources));
    }
    return 0;
  } catch (error) {
    io.stderr(`error: ${describeError(error)}\n`);
    if (error instanceof CliUsageError) {
      io.stderr("Run with --help for usage.\n");
    }
    return 1;
  }
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? "").href) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error("[frame-stats] Fatal:", error);
      process.exitCode = 1;
    },
  );
}
