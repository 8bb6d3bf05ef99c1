import path from 'node:path';
import { homedir } from 'node:os';

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

export function nowISO(): string {
  return new Date().toISOString().replace('T', ' ').slice(0, 19);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
