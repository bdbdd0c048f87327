import test from "node:test";
import assert from "node:assert/strict";
import { Readable } from "stream";
import { runCli, type CliIo } from "../frame-stats";

const log = [
  "Stats Viewer : framenumber 1",
  "    Physics Actors 3",
  "Stats Viewer : framenumber 2",
  "    Physics Actors 5",
  "Stats Viewer : framenumber 3",
  "",
].join("\n");

function capture(input: string) {
  const output = { stdout: "", stderr: "" };
  const io: CliIo = {
    stdout: (text) => {
      output.stdout += text;
    },
    stderr: (text) => {
      output.stderr += text;
    },
    stdin: Readable.from([input]),
  };
  return { io, output };
}

test("runCli prints the key universe", async () => {
  const { io, output } = capture(log);
  assert.equal(await runCli(["--print_keys"], io), 0);
  assert.equal(output.stdout, "Physics Actors\nframenumber\n");
  assert.match(output.stderr, /\[reader\] stdin: 2 frames from 5 lines\n$/);
});

test("runCli prints a stats table", async () => {
  const { io, output } = capture(log);
  assert.equal(await runCli(["--stats", "Physics Actors"], io), 0);
  assert.deepEqual(output.stdout.split("\n"), [
    "## stats",
    "",
    "| source | key            | number | min | max | mean | median | stdev    | q95 |",
    "|--------|----------------|--------|-----|-----|------|--------|----------|-----|",
    "| stdin  | Physics Actors | 2      | 3   | 5   | 4    | 4      | 1.414214 | 4.9 |",
    "",
  ]);
});

test("runCli prints views as JSON", async () => {
  const { io, output } = capture(log);
  assert.equal(await runCli(["--json", "--timeseries", "Physics Actors", "--begin_frame", "1"], io), 0);
  assert.deepEqual(JSON.parse(output.stdout), {
    views: [
      {
        kind: "timeseries",
        lines: [
          { label: "Physics Actors:stdin", source: "stdin", key: "Physics Actors", x: [0], y: [5] },
        ],
      },
    ],
  });
});

test("runCli reports malformed input and exits with 1", async () => {
  const { io, output } = capture("Stats Viewer : framenumber 1\n    Physics Actors lots\n");
  assert.equal(await runCli(["--print_keys"], io), 1);
  assert.equal(output.stdout, "");
  assert.equal(output.stderr, 'error: stdin:line 2: invalid numeric value "lots"\n');
});

test("runCli points at --help on usage errors", async () => {
  const { io, output } = capture(log);
  assert.equal(await runCli(["--bogus"], io), 1);
  assert.equal(output.stderr, "error: Unknown option: --bogus\nRun with --help for usage.\n");
});

test("runCli prints usage", async () => {
  const { io, output } = capture(log);
  assert.equal(await runCli(["--help"], io), 0);
  assert.match(output.stdout, /^Usage: frame-stats \[options\] \[path\.\.\.\]/);
});

test("runCli writes non-finite values as strings in JSON", async () => {
  const { io, output } = capture(
    [
      "Stats Viewer : framenumber 1",
      "    Drift nan",
      "Stats Viewer : framenumber 2",
      "    Drift -inf",
      "Stats Viewer : framenumber 3",
      "",
    ].join("\n"),
  );
  assert.equal(await runCli(["--json", "--timeseries", "Drift"], io), 0);
  assert.deepEqual(JSON.parse(output.stdout), {
    views: [
      {
        kind: "timeseries",
        lines: [{ label: "Drift:stdin", source: "stdin", key: "Drift", x: [0, 1], y: ["NaN", "-Infinity"] }],
      },
    ],
  });
});
