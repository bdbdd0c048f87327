import { ParseError } from "./errors";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

export function parseScalar(token: string): number {
  const text = token.trim();
  if (INTEGER_PATTERN.test(text)) {
    return Number.parseInt(text, 10);
  }
  if (FLOAT_PATTERN.test(text)) {
    return Number.parseFloat(text);
  }
  const special = SPECIAL_PATTERN.exec(text);
  if (special) {
    if (special[2].toLowerCase() === "nan") {
      return Number.NaN;
    }
    return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  throw new ParseError(`invalid numeric value "${token}"`, token);
}
