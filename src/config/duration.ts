/**
 * Duration literals: a signed sequence of decimal numbers, each with a unit,
 * such as "300ms", "-1.5h" or "2h45m". Valid units are "ns", "us" (or "µs"),
 * "ms", "s", "m" and "h". A bare "0" is also accepted.
 */

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  "µs": 1e-3, // micro sign
  "μs": 1e-3, // Greek mu
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

const COMPONENT = /^(\d+\.?\d*|\.\d+)([a-zµμ]+)/;

/**
 * Parse a duration literal into milliseconds.
 * Returns undefined when the text is not a valid duration.
 */
export function parseDuration(text: string): number | undefined {
  let rest = text;
  let sign = 1;

  if (rest.startsWith("-") || rest.startsWith("+")) {
    sign = rest.startsWith("-") ? -1 : 1;
    rest = rest.slice(1);
  }

  if (rest === "0") {
    return 0;
  }
  if (rest === "") {
    return undefined;
  }

  let total = 0;
  while (rest !== "") {
    const match = COMPONENT.exec(rest);
    if (!match) {
      return undefined;
    }
    const [component, amount, unit] = match;
    const scale = unit !== undefined ? UNIT_MS[unit] : undefined;
    if (amount === undefined || scale === undefined) {
      return undefined;
    }
    total += Number(amount) * scale;
    rest = rest.slice(component.length);
  }

  // no negative zero
  return total === 0 ? 0 : sign * total;
}
