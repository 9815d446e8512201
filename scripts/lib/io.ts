import fg from 'fast-glob';
import fs from 'fs-extra';
import path from 'node:path';

export interface RunOptions {
  check: boolean;
}

export function getRunOptions(argv: string[]): RunOptions {
  return {
    check: argv.includes('--check')
  };
}

export function toPosixRelative(filePath: string): string {
  return path.relative(process.cwd(), filePath).split(path.sep).join('/');
}

export function stableJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

export function stableText(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

export interface WriteResult {
  changed: boolean;
  wrote: boolean;
}

async function writeIfChanged(
  filePath: string,
  next: string,
  options: RunOptions
): Promise<WriteResult> {
  let current: string | null = null;
  if (await fs.pathExists(filePath)) {
    current = await fs.readFile(filePath, 'utf8');
  }

  if (current === next) {
    return { changed: false, wrote: false };
  }

  if (options.check) {
    return { changed: true, wrote: false };
  }

  await fs.ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, next, 'utf8');
  return { changed: true, wrote: true };
}

export async function writeJsonFile(
  filePath: string,
  data: unknown,
  options: RunOptions
): Promise<WriteResult> {
  return writeIfChanged(filePath, stableJson(data), options);
}

export async function writeTextFile(
  filePath: string,
  content: string,
  options: RunOptions
): Promise<WriteResult> {
  return writeIfChanged(filePath, stableText(content), options);
}

/** Relative paths of matching files under `rootDir`, sorted. */
export async function listFiles(rootDir: string, patterns: string[]): Promise<string[]> {
  if (!(await fs.pathExists(rootDir))) {
    return [];
  }

  const files = await fg(patterns, {
    cwd: rootDir,
    dot: false,
    onlyFiles: true
  });

  return files.sort();
}
