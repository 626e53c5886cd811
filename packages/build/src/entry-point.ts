/**
 * Program entry point resolution
 */

import { Stats } from 'fs';
import { readdir, readFile, stat } from 'fs/promises';
import { isAbsolute, join, relative, resolve } from 'path';
import fg from 'fast-glob';
import { BuildConfig, BuildError, BuildErrorCode, errorMessage } from '@crossbuild/core';
import { DEFAULT_CONFIG } from './config';
import { createLogger } from './utils/logger';

const logger = createLogger('entry-point');

const SOURCE_EXTENSION = '.go';
const TEST_SUFFIX = '_test.go';

/** A resolved entry point */
export interface EntryPoint {
  /** Absolute path of the configured file or directory; the working directory for globs */
  path: string;
  /** Source files that were checked for a main function */
  files: string[];
  /** Entry arguments for the toolchain, relative to the working directory */
  args: string[];
}

/**
 * Blank out comments and string literals, keeping line breaks
 */
export function stripCommentsAndStrings(source: string): string {
  const blank = (text: string): string => text.replace(/[^\n]/g, ' ');
  let out = '';
  let i = 0;

  while (i < source.length) {
    const ch = source[i];
    let end = i + 1;

    if (source.startsWith('//', i)) {
      end = source.indexOf('\n', i);
      end = end < 0 ? source.length : end;
    } else if (source.startsWith('/*', i)) {
      end = source.indexOf('*/', i + 2);
      end = end < 0 ? source.length : end + 2;
    } else if (ch === '"' || ch === "'") {
      while (end < source.length && source[end] !== ch && source[end] !== '\n') {
        end += source[end] === '\\' ? 2 : 1;
      }
      end = Math.min(end + 1, source.length);
    } else if (ch === '`') {
      end = source.indexOf('`', i + 1);
      end = end < 0 ? source.length : end + 1;
    } else {
      out += ch;
      i = end;
      continue;
    }

    out += blank(source.slice(i, end));
    i = end;
  }

  return out;
}

/**
 * Whether a source file is in package main and declares a top-level `func main()`
 */
export function hasMainFunction(source: string): boolean {
  const code = stripCommentsAndStrings(source);
  return /^\s*package\s+main\b/m.test(code) && /^func\s+main\s*\(\s*\)/m.test(code);
}

function isSourceFile(name: string): boolean {
  return name.endsWith(SOURCE_EXTENSION) && !name.endsWith(TEST_SUFFIX);
}

async function statPath(path: string): Promise<Stats> {
  try {
    return await stat(path);
  } catch (error) {
    throw new BuildError(BuildErrorCode.FileResolution, errorMessage(error), { cause: error });
  }
}

async function sourceFiles(path: string, workingDir: string, main: string): Promise<Pick<EntryPoint, 'files' | 'args'>> {
  if (fg.isDynamicPattern(main)) {
    const matches = await fg(main, { cwd: workingDir, onlyFiles: true });
    const files = matches.filter(isSourceFile).sort();
    return { files: files.map(file => join(workingDir, file)), args: files };
  }

  const info = await statPath(path);
  if (info.isDirectory()) {
    const entries = await readdir(path);
    return {
      files: entries.filter(isSourceFile).sort().map(name => join(path, name)),
      args: [main]
    };
  }

  return { files: [path], args: [main] };
}

/**
 * Resolve a build's entry point and check it declares a main function.
 * An empty `main` means the working directory.
 */
export async function resolveEntryPoint(build: BuildConfig, workingDir: string): Promise<EntryPoint> {
  const main = build.main || DEFAULT_CONFIG.MAIN;
  const path = isAbsolute(main) ? main : resolve(workingDir, main);
  const { files, args } = await sourceFiles(path, workingDir, main);

  for (const file of files) {
    const source = await readFile(file, 'utf-8');
    if (hasMainFunction(source)) {
      logger.debug(`build ${build.id}: main function found in ${relative(workingDir, file) || file}`);
      return { path, files, args };
    }
  }

  throw new BuildError(
    BuildErrorCode.MissingEntryPoint,
    `build for ${build.id} does not contain a main function`
  );
}
