/**
 * Naming Strategy Registry
 *
 * Maps a rebound identifier to the ordered names its successive assignments
 * receive. Curated sequences come from a data file; anything else is built
 * from generic qualifiers (`initial_`, `base_`, ...).
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError, formatZodError } from '../utils/errors.js';

const IDENTIFIER_PATTERN = /^[a-z_][A-Za-z0-9_]*[?!]?$/;

const NamingTableSchema = z
  .object({
    generic: z.array(z.string().regex(/^[a-z][a-z0-9_]*$/, 'qualifiers must be lowercase words')).min(2),
    curated: z.record(
      z.string().regex(IDENTIFIER_PATTERN),
      z.array(z.string().regex(IDENTIFIER_PATTERN, 'replacement names must be valid identifiers')).min(2)
    ),
  })
  .superRefine((table, ctx) => {
    for (const [identifier, names] of Object.entries(table.curated)) {
      if (new Set(names).size !== names.length) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['curated', identifier], message: 'names must be distinct' });
      }
      if (names.includes(identifier)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['curated', identifier],
          message: 'names must differ from the identifier they replace',
        });
      }
    }
  });

export type NamingTable = z.infer<typeof NamingTableSchema>;

export const DEFAULT_NAMING_FILE = fileURLToPath(new URL('../../data/naming-strategies.json', import.meta.url));

export interface NamingStrategy {
  identifier: string;
  curated: boolean;
  names: readonly string[];
}

export interface NamingRegistryOptions {
  /** Continue with `<identifier>_<n>` once the fixed sequence runs out. */
  unbounded?: boolean;
}

export class NamingRegistry {
  private readonly unbounded: boolean;

  constructor(
    private readonly table: NamingTable,
    options: NamingRegistryOptions = {}
  ) {
    this.unbounded = options.unbounded ?? true;
  }

  static fromFile(filePath: string = DEFAULT_NAMING_FILE, options: NamingRegistryOptions = {}): NamingRegistry {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Failed to read naming strategies from ${filePath}: ${error}`);
    }
    return NamingRegistry.fromData(raw, options, filePath);
  }

  static fromData(raw: unknown, options: NamingRegistryOptions = {}, source = 'naming table'): NamingRegistry {
    const parsed = NamingTableSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid naming strategies in ${source}: ${formatZodError(parsed.error)}`);
    }
    return new NamingRegistry(parsed.data, options);
  }

  isUnbounded(): boolean {
    return this.unbounded;
  }

  isCurated(identifier: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.table.curated, identifier);
  }

  /** The fixed sequence for `identifier`: curated when known, generic otherwise. */
  namesFor(identifier: string): readonly string[] {
    return this.strategyFor(identifier).names;
  }

  strategyFor(identifier: string): NamingStrategy {
    const curated = this.isCurated(identifier) ? this.table.curated[identifier] : undefined;
    if (curated) {
      return { identifier, curated: true, names: curated };
    }
    return {
      identifier,
      curated: false,
      names: this.table.generic.map(qualifier => `${qualifier}_${identifier}`),
    };
  }

  /**
   * Every candidate name in order. Finite in bounded mode; otherwise the
   * fixed sequence is followed by `<identifier>_<position>` forever.
   */
  *candidates(identifier: string): Generator<string, void, undefined> {
    const names = this.namesFor(identifier);
    yield* names;
    if (!this.unbounded) {
      return;
    }
    for (let position = names.length + 1; ; position++) {
      yield `${identifier}_${position}`;
    }
  }

  /**
   * Picks `count` names for successive assignments, skipping any name in
   * `taken`. Slots the sequence cannot fill are `null`.
   */
  pick(identifier: string, count: number, taken: ReadonlySet<string> = new Set()): Array<string | null> {
    const picked: Array<string | null> = [];
    if (count <= 0) {
      return picked;
    }
    for (const candidate of this.candidates(identifier)) {
      if (candidate === identifier || taken.has(candidate)) {
        continue;
      }
      picked.push(candidate);
      if (picked.length === count) {
        return picked;
      }
    }
    while (picked.length < count) {
      picked.push(null);
    }
    return picked;
  }
}
