import fc from 'fast-check';
import {
  compareCandidatesDesc,
  compareVersions,
  parseNumericVersion,
  parseVersion,
  parseVersionSpec,
  selectBestMatch,
} from '../src/download/version/VersionMatcher';
import { VersionCandidate } from '../src/types';

function candidate(fullVersion: string, publishedAt?: string): VersionCandidate {
  return { fullVersion, downloadUrl: `https://dl.test/${fullVersion}.zip`, publishedAt };
}

function select(spec: string, candidates: VersionCandidate[]) {
  const parsed = parseVersionSpec(spec);
  if (!parsed) throw new Error(`unparsable spec ${spec}`);
  return selectBestMatch(parsed, candidates);
}

describe('VersionMatcher', () => {
  describe('parseVersionSpec', () => {
    it('should classify specs', () => {
      expect(parseVersionSpec('latest')).toEqual({ kind: 'latest' });
      expect(parseVersionSpec(' LATEST ')).toEqual({ kind: 'latest' });
      expect(parseVersionSpec('98')).toEqual({ kind: 'numeric', raw: '98', components: [98] });
      expect(parseVersionSpec(' 98.0.4758 ')).toEqual({
        kind: 'numeric',
        raw: '98.0.4758',
        components: [98, 0, 4758],
      });
      expect(parseVersionSpec('115.0esr')).toEqual({ kind: 'literal', raw: '115.0esr' });
    });

    it('should reject empty specs', () => {
      expect(parseVersionSpec('')).toBeUndefined();
      expect(parseVersionSpec('   ')).toBeUndefined();
    });
  });

  describe('compareVersions', () => {
    it('should treat missing components as zero', () => {
      expect(compareVersions([98], [98, 0, 0])).toBe(0);
      expect(compareVersions([98, 0, 1], [98])).toBeGreaterThan(0);
      expect(compareVersions([9], [10])).toBeLessThan(0);
    });

    it('should compare numerically, not lexically', () => {
      const a = parseNumericVersion('100.0.1');
      const b = parseNumericVersion('99.9.9');
      if (!a || !b) throw new Error('expected numeric versions');
      expect(compareVersions(a, b)).toBeGreaterThan(0);
    });
  });

  describe('selectBestMatch', () => {
    it('should pick the highest build inside a prefix', () => {
      const match = select('98', [candidate('98.0.1'), candidate('98.0.4758.102'), candidate('99.0.0')]);
      expect(match?.candidate.fullVersion).toBe('98.0.4758.102');
      expect(match?.matchKind).toBe('prefix');
    });

    it('should not let a prefix cross a component boundary', () => {
      expect(select('9', [candidate('98.0.1'), candidate('99.0.0')])).toBeUndefined();
      expect(select('98.0.47', [candidate('98.0.4758.102')])).toBeUndefined();
    });

    it('should prefer an exact match over a higher prefix match', () => {
      const match = select('98.0', [candidate('98.0'), candidate('98.0.5')]);
      expect(match).toEqual({ candidate: candidate('98.0'), matchKind: 'exact' });
    });

    it('should pick the highest numeric version for latest', () => {
      const match = select('latest', [
        candidate('115.0esr'),
        candidate('99.0.0'),
        candidate('100.0.1'),
        candidate('100.0b3'),
      ]);
      expect(match).toEqual({ candidate: candidate('100.0.1'), matchKind: 'latest' });
    });

    it('should match literal specs exactly only', () => {
      const candidates = [candidate('115.0esr'), candidate('115.0.1esr'), candidate('115.0')];
      expect(select('115.0esr', candidates)?.candidate.fullVersion).toBe('115.0esr');
      expect(select('115esr', candidates)).toBeUndefined();
    });

    it('should break equal versions by most recent publish date', () => {
      const match = select('98', [
        candidate('98.0.1', '2022-01-01T00:00:00.000Z'),
        candidate('98.0.1', '2022-03-01T00:00:00.000Z'),
        candidate('98.0.1'),
      ]);
      expect(match?.candidate.publishedAt).toBe('2022-03-01T00:00:00.000Z');
    });

    it('should return undefined when nothing matches', () => {
      expect(select('9999', [candidate('98.0.1')])).toBeUndefined();
      expect(select('latest', [])).toBeUndefined();
    });

    it('should never return a build outside the requested prefix', () => {
      const version = fc
        .array(fc.integer({ min: 0, max: 20 }), { minLength: 1, maxLength: 4 })
        .map((parts) => parts.join('.'));

      fc.assert(
        fc.property(fc.array(version, { maxLength: 15 }), version, (versions, spec) => {
          const match = select(spec, versions.map((v) => candidate(v)));
          const prefix = spec.split('.');
          const inPrefix = versions.filter((v) => {
            const parts = v.split('.');
            return parts.length >= prefix.length && prefix.every((p, i) => Number(p) === Number(parts[i]));
          });

          if (versions.includes(spec)) {
            expect(match?.matchKind).toBe('exact');
            expect(match?.candidate.fullVersion).toBe(spec);
          } else if (inPrefix.length === 0) {
            expect(match).toBeUndefined();
          } else {
            expect(match?.matchKind).toBe('prefix');
            expect(inPrefix).toContain(match?.candidate.fullVersion);
          }
        }),
        { numRuns: 200 },
      );
    });
  });

  describe('pre-release versions', () => {
    it('should parse alpha, beta and release-candidate tags', () => {
      expect(parseVersion('99.0b5')).toEqual({ components: [99, 0], prerelease: { tag: 'b', number: 5 } });
      expect(parseVersion('100.0a1')).toEqual({ components: [100, 0], prerelease: { tag: 'a', number: 1 } });
      expect(parseVersion('99.0.1')).toEqual({ components: [99, 0, 1] });
      expect(parseVersion('115.0esr')).toBeUndefined();
      expect(parseVersion('99.0b')).toBeUndefined();
    });

    it('should order pre-releases below the release they precede', () => {
      const sorted = ['99.0b3', '99.0', '98.0.1', '99.0rc1', '99.0a1', '99.0b10']
        .map((v) => candidate(v))
        .sort(compareCandidatesDesc)
        .map((c) => c.fullVersion);
      expect(sorted).toEqual(['99.0', '99.0rc1', '99.0b10', '99.0b3', '99.0a1', '98.0.1']);
    });

    it('should offer pre-releases to latest and prefix specs only on request', () => {
      const candidates = [candidate('98.0'), candidate('99.0b3'), candidate('99.0b5')];
      const latest = parseVersionSpec('latest');
      const major = parseVersionSpec('99');
      if (!latest || !major) throw new Error('expected specs');

      expect(selectBestMatch(latest, candidates)?.candidate.fullVersion).toBe('98.0');
      expect(selectBestMatch(latest, candidates, { includePrereleases: true })?.candidate.fullVersion).toBe('99.0b5');
      expect(selectBestMatch(major, candidates)).toBeUndefined();
      expect(selectBestMatch(major, candidates, { includePrereleases: true })).toEqual({
        candidate: candidate('99.0b5'),
        matchKind: 'prefix',
      });
    });
  });

  describe('compareCandidatesDesc', () => {
    it('should sort highest first with non-numeric versions last', () => {
      const sorted = [candidate('115.0esr'), candidate('9.1'), candidate('10.0'), candidate('10.0.1')]
        .sort(compareCandidatesDesc)
        .map((c) => c.fullVersion);
      expect(sorted).toEqual(['10.0.1', '10.0', '9.1', '115.0esr']);
    });

    it('should produce a descending order for any numeric input', () => {
      fc.assert(
        fc.property(
          fc.array(fc.array(fc.integer({ min: 0, max: 999 }), { minLength: 1, maxLength: 4 }), {
            maxLength: 20,
          }),
          (versions) => {
            const sorted = versions.map((v) => candidate(v.join('.'))).sort(compareCandidatesDesc);
            for (let i = 1; i < sorted.length; i++) {
              const prev = parseNumericVersion(sorted[i - 1].fullVersion);
              const next = parseNumericVersion(sorted[i].fullVersion);
              if (!prev || !next) throw new Error('expected numeric versions');
              expect(compareVersions(prev, next)).toBeGreaterThanOrEqual(0);
            }
          },
        ),
      );
    });
  });
});
