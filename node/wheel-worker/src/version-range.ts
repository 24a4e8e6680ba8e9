import semver from 'semver';
import { WheelBuildError } from './errors.js';

/** The legacy major line an interpreter range is tested against. */
export const PYTHON2_RANGE = '>=2.0.0 <3.0.0';

const CLAUSE = /(~=|===|==|!=|<=|>=|<|>|\^|~|=)?\s*(\*|[0-9][0-9A-Za-z.*+-]*)/g;

function invalid(constraint: string, reason: string): WheelBuildError {
  return new WheelBuildError(
    'ConfigurationIncompatible',
    `invalid interpreter range "${constraint}": ${reason}`,
    { constraint },
  );
}

function compatibleRelease(constraint: string, version: string): string {
  const parts = version.split('.');
  const upper = parts.slice(0, -1).map(Number);
  if (parts.length < 2 || upper.some((n) => !Number.isInteger(n))) {
    throw invalid(constraint, `"~=${version}" needs at least two numeric components`);
  }
  upper[upper.length - 1] += 1;
  return `>=${version} <${upper.join('.')}`;
}

function convertClause(constraint: string, op: string | undefined, version: string): string | null {
  if (version === '*') return '*';
  switch (op) {
    case '!=':
      // a single excluded version never changes whether two ranges meet
      return null;
    case '~=':
      return compatibleRelease(constraint, version);
    case '=':
    case '==':
    case '===':
      return version.includes('*') ? version : `=${version}`;
    default:
      return `${op ?? ''}${version}`;
  }
}

/**
 * Translate an interpreter constraint such as `^2.7 || ^3.6`, `>=2.7,<3.0` or `~=3.8`
 * into a node-semver range.
 */
export function toSemverRange(constraint: string): string {
  const trimmed = constraint.trim();
  if (trimmed === '' || trimmed === '*') return '*';

  const alternatives = trimmed.split(/\|\||\bor\b/).map((alt) => alt.trim());
  const converted: string[] = [];
  for (const alt of alternatives) {
    if (!alt) throw invalid(constraint, 'empty alternative');
    const text = alt.replace(/,/g, ' ');
    if (text.replace(CLAUSE, '').trim() !== '') {
      throw invalid(constraint, `cannot parse "${alt}"`);
    }
    const clauses: string[] = [];
    for (const m of text.matchAll(CLAUSE)) {
      const clause = convertClause(constraint, m[1], m[2]);
      if (clause !== null) clauses.push(clause);
    }
    converted.push(clauses.length ? clauses.join(' ') : '*');
  }

  const range = converted.join(' || ');
  if (semver.validRange(range) === null) {
    throw invalid(constraint, `"${range}" is not a valid range`);
  }
  return range;
}

/** True when some version satisfies both the declared constraint and `other`. */
export function allowsAny(constraint: string, other: string): boolean {
  return semver.intersects(toSemverRange(constraint), other);
}
