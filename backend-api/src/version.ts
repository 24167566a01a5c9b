import { readFileSync } from 'node:fs';
import { z } from 'zod';

// package.json лежит рядом с src/, читаем через import.meta.url (ESM).
const packageJsonSchema = z.object({ version: z.string().optional() }).passthrough();

function readBackendVersion(): string {
  try {
    const raw = readFileSync(new URL('../package.json', import.meta.url), 'utf8');
    const parsed = packageJsonSchema.safeParse(JSON.parse(raw));
    return parsed.success ? (parsed.data.version ?? '0.0.0') : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export const backendVersion = readBackendVersion();
