export type CliArgs = { flags: Record<string, string>; positional: string[] };

// --key value, --flag (=> 'true'), everything else is positional.
export function parseArgs(argv: string[]): CliArgs {
  const flags: Record<string, string> = {};
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a.startsWith('--')) {
      const k = a.slice(2);
      const v = argv[i + 1];
      if (v && !v.startsWith('--')) {
        flags[k] = v;
        i++;
      } else {
        flags[k] = 'true';
      }
    } else {
      positional.push(a);
    }
  }
  return { flags, positional };
}

// --no-update is a bare flag, so it may swallow the file path that follows it.
export function resolveImportArgs(argv: string[]) {
  const { flags, positional } = parseArgs(argv);
  const files = [...positional];
  for (const k of ['no-update', 'clear-options']) {
    const v = flags[k];
    if (v !== undefined && v !== 'true') files.push(v);
  }
  return {
    file: files[0] ?? null,
    updateIfExists: flags['no-update'] === undefined,
    clearOptions: flags['clear-options'] !== undefined,
  };
}
