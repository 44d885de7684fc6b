import { InvalidInputError } from "./errors.js";
import type { Labels } from "./types.js";

export type LabelPair = readonly [name: string, value: string];

const LABEL_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/** Prometheus reserves names starting with a double underscore. */
export function isValidLabelName(name: string): boolean {
  return LABEL_NAME.test(name) && !name.startsWith("__");
}

export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n");
}

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Ordered label set for one series: reserved pairs in the order given, then
 * user labels sorted by name. User labels whose name collides with a reserved
 * one, or is not a valid label name, are dropped.
 */
export function seriesLabels(reserved: LabelPair[], user: Labels = {}): LabelPair[] {
  const taken = new Set(reserved.map(([name]) => name));
  const extra = Object.keys(user)
    .filter((name) => !taken.has(name) && isValidLabelName(name))
    .sort(byCodeUnit)
    .map((name): LabelPair => [name, user[name]]);
  return [...reserved, ...extra];
}

export function formatLabels(pairs: LabelPair[]): string {
  if (pairs.length === 0) return "";
  return `{${pairs.map(([name, value]) => `${name}="${escapeLabelValue(value)}"`).join(",")}}`;
}

/** Parses `key=value` strings as given on the command line or in `label.key=value` queries. */
export function parseLabelArgs(args: string[]): Labels {
  const labels: Labels = {};
  for (const arg of args) {
    const eq = arg.indexOf("=");
    if (eq <= 0) throw new InvalidInputError(`invalid label "${arg}" (expected key=value)`);
    labels[arg.slice(0, eq)] = arg.slice(eq + 1);
  }
  return labels;
}

export function matchesLabels(labels: Labels, wanted: Labels): boolean {
  return Object.entries(wanted).every(([k, v]) => labels[k] === v);
}
