/**
 * Lint Report Parsing for Rebinder
 *
 * Extracts "variable declared more than once" diagnostics from the textual
 * output of the lint tool and groups them by file.
 */

import type { Logger } from './logger.js';

export interface RedeclarationDiagnostic {
  file: string;
  line: number;
  column?: number;
  variable: string;
}

/** Which line of a two-line diagnostic carries the location. */
export type ReportOrder = 'location-first' | 'message-first';

export const REDECLARATION_PATTERN = /Variable "([^"]+)" was declared more than once/;

const LOCATION_PATTERN = /((?:[\w.@-]+\/)*[\w.@-]+\.exs?):(\d+)(?::(\d+))?/;

// Box-drawing gutters and arrows some formatters prefix lines with
const GUTTER_PATTERN = /^[\s┃│|→>*-]*/;

interface Location {
  file: string;
  line: number;
  column?: number;
}

export function countRedeclarations(output: string): number {
  const global = new RegExp(REDECLARATION_PATTERN.source, 'g');
  return output.match(global)?.length ?? 0;
}

export class LintReportParser {
  constructor(
    private logger: Logger,
    private order: ReportOrder = 'location-first'
  ) {}

  parse(output: string): RedeclarationDiagnostic[] {
    const diagnostics: RedeclarationDiagnostic[] = [];
    let pendingLocation: Location | null = null;
    let pendingVariable: string | null = null;

    for (const rawLine of output.split('\n')) {
      const line = rawLine.replace(GUTTER_PATTERN, '').trimEnd();
      const location = this.parseLocation(line);
      const variable = this.parseVariable(line);

      // Single-line formats carry both parts
      if (location && variable) {
        diagnostics.push({ ...location, variable });
        pendingLocation = null;
        pendingVariable = null;
        continue;
      }

      if (this.order === 'location-first') {
        if (location) {
          pendingLocation = location;
        } else if (variable && pendingLocation) {
          diagnostics.push({ ...pendingLocation, variable });
          pendingLocation = null;
        }
      } else {
        if (variable) {
          pendingVariable = variable;
        } else if (location && pendingVariable) {
          diagnostics.push({ ...location, variable: pendingVariable });
          pendingVariable = null;
        }
      }
    }

    this.logger.debug(`Parsed ${diagnostics.length} redeclaration diagnostics from lint output`);
    return diagnostics;
  }

  /** Diagnostics grouped as file → distinct variable names, in report order. */
  group(diagnostics: readonly RedeclarationDiagnostic[]): Map<string, Set<string>> {
    const grouped = new Map<string, Set<string>>();
    for (const diagnostic of diagnostics) {
      const variables = grouped.get(diagnostic.file) ?? new Set<string>();
      variables.add(diagnostic.variable);
      grouped.set(diagnostic.file, variables);
    }
    return grouped;
  }

  private parseLocation(line: string): Location | null {
    const match = line.match(LOCATION_PATTERN);
    if (!match) {
      return null;
    }
    const [, file, lineStr, columnStr] = match;
    if (!file || !lineStr) {
      return null;
    }
    return {
      file,
      line: parseInt(lineStr, 10),
      ...(columnStr ? { column: parseInt(columnStr, 10) } : {}),
    };
  }

  private parseVariable(line: string): string | null {
    const match = line.match(REDECLARATION_PATTERN);
    return match?.[1] ?? null;
  }
}
