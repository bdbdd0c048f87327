export type LogWriter = (line: string) => void;

let writer: LogWriter = (line) => console.log(line);

/** Redirects `log` output, e.g. to stderr when stdout carries data. */
export function setLogWriter(next: LogWriter) {
  writer = next;
}

export function formatLogLine(message: string, source: string, date = new Date()) {
  const formattedTime = date.toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  return `${formattedTime} [${source}] ${message}`;
}

export function log(message: string, source = "frame-stats") {
  writer(formatLogLine(message, source));
}
