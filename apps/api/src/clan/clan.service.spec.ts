import { describe, expect, it, vi, beforeEach } from 'vitest';
import type { WgApiClientService } from '@clan-lookup/wg-api-client';
import { ClanService } from './clan.service';

describe('api/ClanService', () => {
  const searchClans = vi.fn();
  const getClanInfo = vi.fn();
  const wgApiClient = {
    searchClans,
    getClanInfo,
  } as unknown as WgApiClientService;
  const service = new ClanService(wgApiClient);

  beforeEach(() => {
    vi.clearAllMocks();
  });

  // ------------------------------------------------------------
  // Lookup by tag
  // ------------------------------------------------------------

  describe('lookupByTag', () => {
    it('upper-cases the tag and searches exactly once', async () => {
      searchClans.mockResolvedValue({ status: 'ok', data: [] });

      await service.lookupByTag('example', 'test-key');

      expect(searchClans).toHaveBeenCalledTimes(1);
      expect(searchClans).toHaveBeenCalledWith('EXAMPLE', 'test-key');
    });

    it('returns the id of the candidate whose tag matches exactly', async () => {
      searchClans.mockResolvedValue({
        status: 'ok',
        meta: { count: 3, total: 3 },
        data: [
          { clan_id: 1, tag: 'EXAMPLE2' },
          { clan_id: 2, tag: 'EXAMPLE' },
          { clan_id: 3, tag: 'EXAMPLE' },
        ],
      });

      await expect(service.lookupByTag('Example', 'test-key')).resolves.toEqual({
        kind: 'found',
        clan: { clan_id: 2, clan_tag: 'EXAMPLE' },
      });
    });

    it('ignores non-matching candidates with unexpected fields', async () => {
      searchClans.mockResolvedValue({
        status: 'ok',
        data: [
          { clan_id: 1, tag: null },
          { tag: 'OTHER' },
          { clan_id: 2, tag: 'EXAMPLE' },
        ],
      });

      await expect(service.lookupByTag('EXAMPLE', 'test-key')).resolves.toEqual({
        kind: 'found',
        clan: { clan_id: 2, clan_tag: 'EXAMPLE' },
      });
    });

    it('classifies a match without clan_id as malformed', async () => {
      searchClans.mockResolvedValue({
        status: 'ok',
        data: [{ tag: 'EXAMPLE' }],
      });

      await expect(service.lookupByTag('EXAMPLE', 'test-key')).resolves.toEqual({
        kind: 'request_failed',
        reason: 'malformed_payload',
        message:
          'An Exception was raised during the api request. MissingFieldError: clan_id.',
      });
    });

    it('is not found when no candidate matches exactly', async () => {
      searchClans.mockResolvedValue({
        status: 'ok',
        data: [{ clan_id: 1, tag: 'EXAMPLE2' }],
      });

      await expect(service.lookupByTag('example', 'test-key')).resolves.toEqual({
        kind: 'not_found',
        message: 'No clan was found for this id: EXAMPLE',
      });
    });

    it('reports an upstream error regardless of data', async () => {
      searchClans.mockResolvedValue({
        status: 'error',
        error: { message: 'SEARCH_NOT_SPECIFIED' },
        data: [{ clan_id: 2, tag: 'EXAMPLE' }],
      });

      await expect(service.lookupByTag('EXAMPLE', 'test-key')).resolves.toEqual({
        kind: 'request_failed',
        reason: 'upstream_rejected',
        message: 'API Request responded with an error: SEARCH_NOT_SPECIFIED',
      });
    });

    it('classifies a payload without data as malformed', async () => {
      searchClans.mockResolvedValue({ status: 'ok' });

      await expect(service.lookupByTag('EXAMPLE', 'test-key')).resolves.toEqual({
        kind: 'request_failed',
        reason: 'malformed_payload',
        message:
          'An Exception was raised during the api request. MissingFieldError: data.',
      });
    });

    it('classifies a rejected request as a transport failure', async () => {
      const error = new Error('connect ECONNREFUSED 127.0.0.1:443');
      error.name = 'AxiosError';
      searchClans.mockRejectedValue(error);

      await expect(service.lookupByTag('EXAMPLE', 'test-key')).resolves.toEqual({
        kind: 'request_failed',
        reason: 'transport_failure',
        message:
          'An Exception was raised during the api request. AxiosError: connect ECONNREFUSED 127.0.0.1:443.',
      });
      expect(searchClans).toHaveBeenCalledTimes(1);
    });
  });

  // ------------------------------------------------------------
  // Lookup by id
  // ------------------------------------------------------------

  describe('lookupById', () => {
    it('returns the tag stored under the id', async () => {
      getClanInfo.mockResolvedValue({
        status: 'ok',
        data: { '5000000': { tag: 'EXAMPLE' } },
      });

      await expect(service.lookupById(5000000, 'test-key')).resolves.toEqual({
        kind: 'found',
        clan: { clan_id: 5000000, clan_tag: 'EXAMPLE' },
      });
      expect(getClanInfo).toHaveBeenCalledWith(5000000, 'test-key');
    });

    it.each([
      ['an empty tag', { tag: '' }],
      ['a null tag', { tag: null }],
      ['a missing tag', {}],
    ])('is not found for %s', async (_label, entry) => {
      getClanInfo.mockResolvedValue({ status: 'ok', data: { '42': entry } });

      await expect(service.lookupById(42, 'test-key')).resolves.toEqual({
        kind: 'not_found',
        message: 'No clan was found for this id: 42',
      });
    });

    it('classifies a null entry for the id as malformed', async () => {
      getClanInfo.mockResolvedValue({ status: 'ok', data: { '42': null } });

      await expect(service.lookupById(42, 'test-key')).resolves.toEqual({
        kind: 'request_failed',
        reason: 'malformed_payload',
        message:
          'An Exception was raised during the api request. InvalidFieldError: 42.',
      });
    });

    it('reports an upstream error', async () => {
      getClanInfo.mockResolvedValue({
        status: 'error',
        error: { message: 'INVALID_APPLICATION_ID' },
      });

      await expect(service.lookupById(42, 'test-key')).resolves.toEqual({
        kind: 'request_failed',
        reason: 'upstream_rejected',
        message: 'API Request responded with an error: INVALID_APPLICATION_ID',
      });
    });

    it('classifies a payload without the requested id as malformed', async () => {
      getClanInfo.mockResolvedValue({ status: 'ok', data: {} });

      await expect(service.lookupById(42, 'test-key')).resolves.toEqual({
        kind: 'request_failed',
        reason: 'malformed_payload',
        message:
          'An Exception was raised during the api request. MissingFieldError: 42.',
      });
    });

    it('classifies a non-object data field as malformed', async () => {
      getClanInfo.mockResolvedValue({ status: 'ok', data: 'unexpected' });

      await expect(service.lookupById(42, 'test-key')).resolves.toEqual({
        kind: 'request_failed',
        reason: 'malformed_payload',
        message:
          'An Exception was raised during the api request. InvalidFieldError: data.',
      });
    });
  });
});
