import * as fs from 'fs';

/**
 * Source descriptor. Chunks keep a reference to it for diagnostics.
 */
export interface Source {
  fname: string;
  text: string;
}

export function makeSource(text: string, fname: string = '<script>'): Source {
  return { fname, text };
}

/**
 * Read a script from disk. Returns null when the file cannot be read.
 */
export function loadSource(fname: string): Source | null {
  try {
    return { fname, text: fs.readFileSync(fname, 'utf-8') };
  } catch (error) {
    if (process.env.DEBUG) {
      console.error(`[source] ${fname}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return null;
  }
}
