// Duration strings as the signing runtime reads them: "1500ms", "1s", "1.5m", "1h30m", "-2us".

const UNIT_NS = new Map<string, number>([
  ['ns', 1],
  ['us', 1e3],
  ['µs', 1e3], // U+00B5
  ['μs', 1e3], // U+03BC
  ['ms', 1e6],
  ['s', 1e9],
  ['m', 60e9],
  ['h', 3600e9],
]);

const SEGMENT = /^(\d*)(?:\.(\d*))?([^\d.]+)/;

/** Parses a duration into nanoseconds, or returns null when the string is not a duration. */
export function parseDuration(s: string): number | null {
  let rest = s;
  let sign = 1;
  if (rest.startsWith('-') || rest.startsWith('+')) {
    if (rest[0] === '-') sign = -1;
    rest = rest.slice(1);
  }
  if (rest === '0') return 0;
  if (rest === '') return null;

  let total = 0;
  while (rest.length > 0) {
    const m = SEGMENT.exec(rest);
    if (!m) return null;
    const [whole, int, frac = '', unit] = m;
    if (int === '' && frac === '') return null;
    const scale = UNIT_NS.get(unit);
    if (scale === undefined) return null;
    total += Number(`${int || '0'}.${frac || '0'}`) * scale;
    rest = rest.slice(whole.length);
  }
  return sign * total;
}

export function isDuration(s: string): boolean {
  return parseDuration(s) !== null;
}
