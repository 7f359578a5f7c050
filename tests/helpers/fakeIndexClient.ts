import { IVersionIndexClient, ListCandidatesOptions } from '../../src/download/core/types';
import { Browser, Platform, ReleaseChannel, VersionCandidate, formatPlatform } from '../../src/types';
import { UnsupportedPlatformError } from '../../src/utils/errors';

/**
 * In-memory version index keyed by "os-arch"; records every listing it serves
 */
export class FakeIndexClient implements IVersionIndexClient {
  readonly calls: Array<{ platform: Platform; options: ListCandidatesOptions }> = [];
  failure?: Error;

  constructor(
    readonly browser: Browser,
    public candidates: Record<string, VersionCandidate[]>,
  ) {}

  supportsPlatform(platform: Platform, _channel: ReleaseChannel): boolean {
    return formatPlatform(platform) in this.candidates;
  }

  async listCandidates(platform: Platform, options: ListCandidatesOptions): Promise<VersionCandidate[]> {
    if (!this.supportsPlatform(platform, options.channel)) {
      throw new UnsupportedPlatformError(this.browser, platform);
    }
    this.calls.push({ platform, options });
    if (this.failure) {
      throw this.failure;
    }
    return [...this.candidates[formatPlatform(platform)]];
  }

  async describeArtifact(candidate: VersionCandidate): Promise<VersionCandidate | undefined> {
    return candidate;
  }
}
