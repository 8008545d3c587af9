// Status Kernel - threshold ranges
//
// Range syntax: [@][start:][end]
//   "10"     alert outside 0..10
//   "10:"    alert below 10
//   "~:10"   alert above 10
//   "10:20"  alert outside 10..20
//   "@10:20" alert inside 10..20

import { ProbeConfigError } from "../errors";

export interface ThresholdRangeV1 {
  // Range text as given, kept for performance data.
  text: string;
  start: number;
  end: number;
  // Alert inside the range instead of outside.
  inside: boolean;
}

const NUMBER_RE = /^[-+]?(\d+(\.\d*)?|\.\d+)$/;

function parseBound(token: string, whenEmpty: number, text: string): number {
  if (token === "") return whenEmpty;
  if (!NUMBER_RE.test(token)) {
    throw new ProbeConfigError("INVALID_THRESHOLD", `"${text}" is not a valid range`);
  }
  return Number(token);
}

export function parseThresholdRangeV1(input: string): ThresholdRangeV1 {
  const text = input.trim();
  let body = text;
  let inside = false;

  if (body.startsWith("@")) {
    inside = true;
    body = body.slice(1);
  }
  if (body === "") {
    throw new ProbeConfigError("INVALID_THRESHOLD", `"${text}" is not a valid range`);
  }

  let start = 0;
  let end: number;
  const colon = body.indexOf(":");
  if (colon === -1) {
    end = parseBound(body, Number.POSITIVE_INFINITY, text);
  } else {
    const startToken = body.slice(0, colon);
    start = startToken === "~" ? Number.NEGATIVE_INFINITY : parseBound(startToken, 0, text);
    end = parseBound(body.slice(colon + 1), Number.POSITIVE_INFINITY, text);
  }

  if (start > end) {
    throw new ProbeConfigError("INVALID_THRESHOLD", `"${text}" has start greater than end`);
  }

  return Object.freeze({ text, start, end, inside });
}

/**
 * True when the value should raise an alert for this range.
 */
export function rangeAlertsV1(range: ThresholdRangeV1, value: number): boolean {
  const within = value >= range.start && value <= range.end;
  return range.inside ? within : !within;
}
