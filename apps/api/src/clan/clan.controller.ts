import {
  Controller,
  Get,
  HttpException,
  HttpStatus,
  Param,
  ParseIntPipe,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { ClanRecord, LookupOutcome } from '@clan-lookup/shared-types';
import { CLAN_NOT_FOUND_MARKER, ClanService } from './clan.service';

@Controller('clan')
export class ClanController {
  private readonly apiKey: string;

  constructor(
    private readonly clanService: ClanService,
    config: ConfigService
  ) {
    this.apiKey = config.getOrThrow<string>('API_KEY');
  }

  @Get('tag/:clanTag')
  async getClanByTag(@Param('clanTag') clanTag: string): Promise<ClanRecord> {
    return toResponse(await this.clanService.lookupByTag(clanTag, this.apiKey));
  }

  @Get('id/:clanId')
  async getClanById(
    @Param('clanId', ParseIntPipe) clanId: number
  ): Promise<ClanRecord> {
    return toResponse(await this.clanService.lookupById(clanId, this.apiKey));
  }
}

/**
 * Unwraps a found clan or throws the matching HTTP error with a `{ detail }` body.
 */
function toResponse(outcome: LookupOutcome): ClanRecord {
  if (outcome.kind === 'found') {
    return outcome.clan;
  }
  const status = outcome.message.includes(CLAN_NOT_FOUND_MARKER)
    ? HttpStatus.NOT_FOUND
    : HttpStatus.BAD_REQUEST;
  throw new HttpException({ detail: outcome.message }, status);
}
