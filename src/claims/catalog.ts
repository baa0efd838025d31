/**
 * TOML claim catalog.
 *
 * A catalog holds named claims in `[series.<name>]` and
 * `[inequality.<name>]` tables:
 *
 * ```toml
 * [series.quartic]
 * formula = "1/d^4"
 * index = "d"
 * variables = []
 * bounds = ["1", "Infinity"]
 * bound = "1"
 *
 * [inequality.geometric_mean]
 * variables = ["x", "y"]
 * domain = ["x > 0", "y > 0"]
 * lhs = "(x*y)^(1/2)"
 * rhs = "(x+y)/2"
 * ```
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { errorMessage, isRecord } from '../utils/guards.js';
import { safeReadTextFile } from '../utils/safe-fs.js';
import { createInequalityClaim, createSeriesClaim } from './claims.js';
import { ClaimValidationError, type Claim } from './types.js';

/**
 * Error thrown when a catalog cannot be read or one of its entries is invalid.
 */
export class ClaimCatalogError extends Error {
  /** Dotted path of the offending table or field, if known. */
  public readonly path: string | undefined;
  /** The underlying error, if any. */
  public readonly cause: Error | undefined;

  constructor(message: string, path?: string, cause?: Error) {
    super(message);
    this.name = 'ClaimCatalogError';
    this.path = path;
    this.cause = cause;
  }
}

/** Name → claim, in catalog order. */
export type ClaimCatalog = ReadonlyMap<string, Claim>;

const PROHIBITED_KEYS = ['__proto__', 'constructor', 'prototype'];
const NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_-]*$/;
const KNOWN_SECTIONS = ['series', 'inequality'];

function requireString(table: Record<string, unknown>, key: string, path: string): string {
  const value = table[key];
  if (typeof value !== 'string') {
    throw new ClaimCatalogError(
      `Invalid type for '${path}.${key}': expected string, got ${typeof value}`,
      `${path}.${key}`
    );
  }
  return value;
}

function optionalString(table: Record<string, unknown>, key: string, path: string): string | undefined {
  return table[key] === undefined ? undefined : requireString(table, key, path);
}

/** Accepts `["a", "b"]` or a `"{a, b}"` string. */
function requireList(table: Record<string, unknown>, key: string, path: string): string[] | string {
  const value = table[key];
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => {
      if (typeof item !== 'string') {
        throw new ClaimCatalogError(
          `Invalid type for '${path}.${key}[${String(index)}]': expected string, got ${typeof item}`,
          `${path}.${key}`
        );
      }
      return item;
    });
  }
  throw new ClaimCatalogError(
    `Invalid type for '${path}.${key}': expected array or string, got ${typeof value}`,
    `${path}.${key}`
  );
}

function optionalList(
  table: Record<string, unknown>,
  key: string,
  path: string
): string[] | string | undefined {
  return table[key] === undefined ? undefined : requireList(table, key, path);
}

function requireBounds(table: Record<string, unknown>, path: string): string[] {
  const value = table.bounds;
  if (!Array.isArray(value)) {
    throw new ClaimCatalogError(`'${path}.bounds' must be an array of two values`, `${path}.bounds`);
  }
  // bounds = [0, 10] is as good as bounds = ["0", "10"]
  return value.map((item) => {
    if (typeof item === 'string') {
      return item;
    }
    if (typeof item === 'number' || typeof item === 'bigint') {
      return String(item);
    }
    throw new ClaimCatalogError(
      `Invalid type in '${path}.bounds': expected string or number, got ${typeof item}`,
      `${path}.bounds`
    );
  });
}

function buildClaim(kind: 'series' | 'inequality', name: string, table: Record<string, unknown>): Claim {
  const path = `${kind}.${name}`;
  try {
    if (kind === 'series') {
      return createSeriesClaim({
        name,
        formula: requireString(table, 'formula', path),
        summationIndex: requireString(table, 'index', path),
        otherVariables: optionalList(table, 'variables', path) ?? [],
        summationBounds: requireBounds(table, path),
        conditions: optionalString(table, 'conditions', path),
        conjecturedUpperBound: requireString(table, 'bound', path),
      });
    }
    return createInequalityClaim({
      name,
      variables: requireList(table, 'variables', path),
      domain: optionalList(table, 'domain', path),
      lhs: requireString(table, 'lhs', path),
      rhs: requireString(table, 'rhs', path),
    });
  } catch (error) {
    if (error instanceof ClaimValidationError) {
      throw new ClaimCatalogError(`Invalid claim '${path}': ${error.message}`, `${path}.${error.field}`, error);
    }
    throw error;
  }
}

/**
 * Parses catalog TOML into a name → claim map.
 *
 * @throws ClaimCatalogError on TOML syntax errors, unknown sections,
 * duplicate names or claims that fail validation.
 */
export function parseClaimCatalog(tomlContent: string): ClaimCatalog {
  let parsed: unknown;
  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    throw new ClaimCatalogError(
      `Invalid TOML syntax: ${errorMessage(error)}`,
      undefined,
      error instanceof Error ? error : undefined
    );
  }
  if (!isRecord(parsed)) {
    throw new ClaimCatalogError('Catalog must be a TOML table');
  }

  const catalog = new Map<string, Claim>();

  for (const [section, tables] of Object.entries(parsed)) {
    if (section !== 'series' && section !== 'inequality') {
      throw new ClaimCatalogError(
        `Unknown section '${section}': expected one of ${KNOWN_SECTIONS.join(', ')}`,
        section
      );
    }
    if (!isRecord(tables)) {
      throw new ClaimCatalogError(`'${section}' must contain tables of claims`, section);
    }

    for (const [name, table] of Object.entries(tables)) {
      if (PROHIBITED_KEYS.includes(name) || !NAME_PATTERN.test(name)) {
        throw new ClaimCatalogError(`Invalid claim name '${name}'`, `${section}.${name}`);
      }
      if (catalog.has(name)) {
        throw new ClaimCatalogError(`Duplicate claim name '${name}'`, `${section}.${name}`);
      }
      if (!isRecord(table)) {
        throw new ClaimCatalogError(`'${section}.${name}' must be a table`, `${section}.${name}`);
      }
      catalog.set(name, buildClaim(section, name, table));
    }
  }

  return catalog;
}

/**
 * Reads and parses a catalog file.
 *
 * @throws ClaimCatalogError if the file cannot be read or parsed.
 */
export async function loadClaimCatalog(filePath: string): Promise<ClaimCatalog> {
  let content: string;
  try {
    content = await safeReadTextFile(filePath);
  } catch (error) {
    throw new ClaimCatalogError(
      `Failed to read claim catalog '${filePath}': ${errorMessage(error)}`,
      undefined,
      error instanceof Error ? error : undefined
    );
  }
  return parseClaimCatalog(content);
}
