/**
 * Build Descriptor
 * Reads what a setuptools/py2app `setup.py` declares about the application
 */

import { ConfigurationError, errorMessage } from '@apppack/shared';
import { readFile } from 'node:fs/promises';
import type { BuildDescriptor } from './types.js';

const QUOTED = /(['"])(.*?)\1/g;

/**
 * Drop docstrings and comment lines so they cannot shadow real assignments
 */
function stripNoise(source: string): string {
  return source
    .replace(/("""|''')[\s\S]*?\1/g, '')
    .split('\n')
    .filter((line) => !line.trimStart().startsWith('#'))
    .join('\n');
}

function quotedStrings(text: string): string[] {
  return Array.from(text.matchAll(QUOTED), (match) => match[2] ?? '');
}

/**
 * The argument text of the last `setup(...)` call, parentheses balanced
 */
function setupCallArguments(source: string): string | undefined {
  const start = source.lastIndexOf('setup(');
  if (start === -1) return undefined;

  let depth = 0;
  for (let i = start + 'setup'.length; i < source.length; i++) {
    const char = source[i];
    if (char === '(') depth++;
    else if (char === ')') {
      depth--;
      if (depth === 0) return source.slice(start + 'setup('.length, i);
    }
  }
  return source.slice(start + 'setup('.length);
}

/**
 * Resolve a module-level `NAME = value` assignment, first match wins
 */
function moduleAssignment(source: string, identifier: string): string | undefined {
  const pattern = new RegExp(`^${identifier}\\s*=\\s*(.+)$`, 'm');
  return source.match(pattern)?.[1]?.trim();
}

function keywordArgument(args: string, keyword: string): string | undefined {
  const pattern = new RegExp(`(?:^|[\\s,(])${keyword}\\s*=\\s*(\\[[^\\]]*\\]|(['"]).*?\\2|[A-Za-z_][\\w.]*)`);
  return args.match(pattern)?.[1];
}

/**
 * Turn an expression into a string value, following one level of
 * module-level variable indirection
 */
function stringValue(source: string, expression: string | undefined): string | undefined {
  if (!expression) return undefined;
  const literal = quotedStrings(expression)[0];
  if (literal !== undefined) return literal;
  const assigned = moduleAssignment(source, expression);
  return assigned ? quotedStrings(assigned)[0] : undefined;
}

function listValue(source: string, expression: string | undefined): string[] {
  if (!expression) return [];
  if (expression.startsWith('[')) return quotedStrings(expression);
  const assigned = moduleAssignment(source, expression);
  return assigned ? quotedStrings(assigned) : [];
}

function iconFile(source: string): string | undefined {
  const dictEntry = source.match(/['"]iconfile['"]\s*:\s*(['"])(.*?)\1/);
  if (dictEntry) return dictEntry[2];
  const keyword = source.match(/\biconfile\s*=\s*(['"])(.*?)\1/);
  return keyword?.[2];
}

/**
 * Extract name, version, entry points and icon from descriptor source text
 */
export function parseBuildDescriptor(source: string, path: string): BuildDescriptor {
  const cleaned = stripNoise(source);
  const args = setupCallArguments(cleaned) ?? '';

  return {
    path,
    name: stringValue(cleaned, keywordArgument(args, 'name')),
    version: stringValue(cleaned, keywordArgument(args, 'version')),
    entryPoints: listValue(cleaned, keywordArgument(args, 'app')),
    iconFile: iconFile(cleaned),
  };
}

export async function loadBuildDescriptor(path: string): Promise<BuildDescriptor> {
  let source: string;
  try {
    source = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read build descriptor ${path}: ${errorMessage(error)}`, {
      stage: 'checking',
      path,
    });
  }
  return parseBuildDescriptor(source, path);
}

/**
 * Name of the bundle the packaging tool writes into dist/
 */
export function resolveBundleName(descriptor: BuildDescriptor, override?: string): string {
  if (override) return override;
  if (!descriptor.name) {
    throw new ConfigurationError(
      `Build descriptor ${descriptor.path} does not declare a name; set APPPACK_BUNDLE_NAME`,
      { stage: 'checking', path: descriptor.path }
    );
  }
  return `${descriptor.name}.app`;
}
