import { Injectable, Logger } from '@nestjs/common';
import {
  WgApiClientService,
  findSearchMatch,
  readClanInfoTag,
  readEnvelope,
} from '@clan-lookup/wg-api-client';
import type { LookupOutcome } from '@clan-lookup/shared-types';

// Substring the HTTP layer uses to tell a missing clan from any other failure
export const CLAN_NOT_FOUND_MARKER = 'No clan was found';

@Injectable()
export class ClanService {
  private readonly logger = new Logger(ClanService.name);

  constructor(private wgApiClient: WgApiClientService) {}

  /**
   * Resolves a clan tag to its clan id.
   * @param tag - Clan tag, matched case-insensitively
   * @param credential - Wargaming application_id
   */
  async lookupByTag(tag: string, credential: string): Promise<LookupOutcome> {
    const clanTag = tag.toUpperCase();
    this.logger.log(`Looking up clan id for tag ${clanTag}`);

    return this.translate(
      () => this.wgApiClient.searchClans(clanTag, credential),
      (body) => {
        // The upstream search also matches partial tags
        const match = findSearchMatch(body, clanTag);
        if (!match) {
          return notFound(clanTag);
        }
        return {
          kind: 'found',
          clan: { clan_id: match.clan_id, clan_tag: clanTag },
        };
      }
    );
  }

  /**
   * Resolves a clan id to its clan tag.
   * @param clanId - Clan ID
   * @param credential - Wargaming application_id
   */
  async lookupById(clanId: number, credential: string): Promise<LookupOutcome> {
    this.logger.log(`Looking up clan tag for id ${clanId}`);

    return this.translate(
      () => this.wgApiClient.getClanInfo(clanId, credential),
      (body) => {
        const tag = readClanInfoTag(body, clanId);
        if (!tag) {
          return notFound(clanId);
        }
        return { kind: 'found', clan: { clan_id: clanId, clan_tag: tag } };
      }
    );
  }

  /**
   * Runs one upstream request and classifies whatever comes back.
   * Never rejects: every failure becomes a `request_failed` outcome.
   */
  private async translate(
    request: () => Promise<unknown>,
    readData: (body: unknown) => LookupOutcome
  ): Promise<LookupOutcome> {
    let body: unknown;
    try {
      body = await request();
    } catch (error) {
      return {
        kind: 'request_failed',
        reason: 'transport_failure',
        message: describeFailure(error),
      };
    }

    try {
      const envelope = readEnvelope(body);
      if (!envelope.ok) {
        this.logger.warn(`Upstream rejected request: ${envelope.message}`);
        return {
          kind: 'request_failed',
          reason: 'upstream_rejected',
          message: `API Request responded with an error: ${envelope.message}`,
        };
      }
      return readData(body);
    } catch (error) {
      const message = describeFailure(error);
      this.logger.warn(`Unexpected upstream payload: ${message}`);
      return {
        kind: 'request_failed',
        reason: 'malformed_payload',
        message,
      };
    }
  }
}

function notFound(key: string | number): LookupOutcome {
  return {
    kind: 'not_found',
    message: `${CLAN_NOT_FOUND_MARKER} for this id: ${key}`,
  };
}

function describeFailure(error: unknown): string {
  const detail =
    error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  return `An Exception was raised during the api request. ${detail}.`;
}
