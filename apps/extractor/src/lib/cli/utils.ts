export type Flags = Record<string, string>; // values are always strings

/** Parse --k=v and bare --k (as "true"). Positional args are ignored. */
export function parseFlags(argv: string[] = []): Flags {
  const flags: Flags = {};
  for (const a of argv) {
    if (!a.startsWith('--')) continue;
    const m = /^--([^=]+)(?:=(.*))?$/.exec(a);
    if (!m) continue;
    const key = (m[1] ?? '').trim();
    const val = (m[2] ?? 'true').trim();
    if (key) flags[key] = val;
  }
  return flags;
}

/** Get a string flag (empty/whitespace → undefined). */
export function flagStr(flags: Flags, key: string): string | undefined {
  const v = flags[key];
  if (typeof v !== 'string') return undefined;
  const s = v.trim();
  return s ? s : undefined;
}

/** Split comma/space-separated flag into array of non-empty tokens. */
export function flagCSV(flags: Flags, key: string): string[] {
  const s = flagStr(flags, key);
  if (!s) return [];
  return s
    .split(/[, \t\r\n]+/)
    .map((x) => x.trim())
    .filter(Boolean);
}

/** Positional arguments (anything not starting with --). */
export function positionals(argv: string[] = []): string[] {
  return argv.filter((a) => !a.startsWith('--'));
}

/** UTC stamp for output file names, e.g. 20250526_143005. */
export function fileStamp(d: Date): string {
  const iso = d.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}
