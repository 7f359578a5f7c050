/**
 * VersionMatcher - parses user version specs and picks the best candidate
 *
 * Precedence: "latest" > exact string match > numeric prefix match.
 * Ordering is numeric per dot-separated component (missing components are 0),
 * then by pre-release tag (a < b < rc < release), ties broken by the most
 * recent publish date.
 */

import { VersionCandidate } from '../../types';

export type MatchKind = 'latest' | 'prefix' | 'exact';

export type ParsedVersionSpec =
    | { kind: 'latest' }
    | { kind: 'numeric'; raw: string; components: number[] }
    | { kind: 'literal'; raw: string };

export interface VersionMatch {
    candidate: VersionCandidate;
    matchKind: MatchKind;
}

export interface ParsedVersion {
    components: number[];
    /** Set for alpha, beta and release-candidate builds such as 99.0b5 */
    prerelease?: { tag: string; number: number };
}

export interface MatchOptions {
    /** Let "latest" and prefix specs pick pre-release builds */
    includePrereleases?: boolean;
}

const NUMERIC_VERSION = /^\d+(\.\d+)*$/;
const TAGGED_VERSION = /^(\d+(?:\.\d+)*)(a|b|rc)(\d+)$/;

const PRERELEASE_RANK: Record<string, number> = { a: 0, b: 1, rc: 2 };

/**
 * Parse a version spec. Returns undefined for an empty spec.
 * The input string is left untouched; the result carries a trimmed copy.
 */
export function parseVersionSpec(spec: string): ParsedVersionSpec | undefined {
    const raw = spec.trim();
    if (raw.length === 0) {
        return undefined;
    }
    if (raw.toLowerCase() === 'latest') {
        return { kind: 'latest' };
    }
    const components = parseNumericVersion(raw);
    if (components) {
        return { kind: 'numeric', raw, components };
    }
    return { kind: 'literal', raw };
}

/**
 * Components of a purely numeric dotted version, undefined otherwise
 */
export function parseNumericVersion(version: string): number[] | undefined {
    if (!NUMERIC_VERSION.test(version)) {
        return undefined;
    }
    return version.split('.').map((part) => Number.parseInt(part, 10));
}

/**
 * Numeric components plus an optional pre-release tag.
 * Undefined for anything else (115.0esr, nightly labels).
 */
export function parseVersion(version: string): ParsedVersion | undefined {
    const numeric = parseNumericVersion(version);
    if (numeric) {
        return { components: numeric };
    }
    const tagged = TAGGED_VERSION.exec(version);
    if (!tagged) {
        return undefined;
    }
    return {
        components: tagged[1].split('.').map((part) => Number.parseInt(part, 10)),
        prerelease: { tag: tagged[2], number: Number.parseInt(tagged[3], 10) },
    };
}

export function compareVersions(a: readonly number[], b: readonly number[]): number {
    const length = Math.max(a.length, b.length);
    for (let i = 0; i < length; i++) {
        const diff = (a[i] ?? 0) - (b[i] ?? 0);
        if (diff !== 0) {
            return diff;
        }
    }
    return 0;
}

export function matchesPrefix(version: readonly number[], prefix: readonly number[]): boolean {
    if (version.length < prefix.length) {
        return false;
    }
    return prefix.every((component, i) => version[i] === component);
}

/**
 * A release sorts above every pre-release of the same numbers
 */
export function compareParsedVersions(a: ParsedVersion, b: ParsedVersion): number {
    const diff = compareVersions(a.components, b.components);
    if (diff !== 0) {
        return diff;
    }
    if (!a.prerelease || !b.prerelease) {
        return (a.prerelease ? 0 : 1) - (b.prerelease ? 0 : 1);
    }
    const rank = (PRERELEASE_RANK[a.prerelease.tag] ?? 0) - (PRERELEASE_RANK[b.prerelease.tag] ?? 0);
    return rank !== 0 ? rank : a.prerelease.number - b.prerelease.number;
}

/**
 * Descending order: highest version first, then most recently published.
 * Unparsable versions sort after everything else.
 */
export function compareCandidatesDesc(a: VersionCandidate, b: VersionCandidate): number {
    const av = parseVersion(a.fullVersion);
    const bv = parseVersion(b.fullVersion);

    if (av && bv) {
        const diff = compareParsedVersions(bv, av);
        if (diff !== 0) return diff;
    } else if (av) {
        return -1;
    } else if (bv) {
        return 1;
    }

    const at = publishedTime(a);
    const bt = publishedTime(b);
    if (at === bt) return 0;
    return bt > at ? 1 : -1;
}

/**
 * Select the single best candidate for a parsed spec
 */
export function selectBestMatch(
    spec: ParsedVersionSpec,
    candidates: readonly VersionCandidate[],
    options: MatchOptions = {},
): VersionMatch | undefined {
    const eligible = (c: VersionCandidate): ParsedVersion | undefined => {
        const version = parseVersion(c.fullVersion);
        return version && (!version.prerelease || options.includePrereleases) ? version : undefined;
    };

    if (spec.kind === 'latest') {
        const best = pickBest(candidates.filter((c) => eligible(c) !== undefined));
        return best ? { candidate: best, matchKind: 'latest' } : undefined;
    }

    const exact = pickBest(candidates.filter((c) => c.fullVersion === spec.raw));
    if (exact) {
        return { candidate: exact, matchKind: 'exact' };
    }

    if (spec.kind === 'literal') {
        return undefined;
    }

    const prefixed = candidates.filter((c) => {
        const version = eligible(c);
        return version !== undefined && matchesPrefix(version.components, spec.components);
    });
    const best = pickBest(prefixed);
    return best ? { candidate: best, matchKind: 'prefix' } : undefined;
}

function pickBest(candidates: readonly VersionCandidate[]): VersionCandidate | undefined {
    return [...candidates].sort(compareCandidatesDesc)[0];
}

function publishedTime(candidate: VersionCandidate): number {
    if (!candidate.publishedAt) return Number.NEGATIVE_INFINITY;
    const time = Date.parse(candidate.publishedAt);
    return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
}
