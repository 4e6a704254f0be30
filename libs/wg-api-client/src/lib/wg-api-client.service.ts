import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';

export const WG_API_DEFAULT_BASE_URL = 'https://api.worldoftanks.eu';
export const WG_API_TIMEOUT_MS = 5000;

@Injectable()
export class WgApiClientService {
  private http: AxiosInstance;
  private readonly logger = new Logger(WgApiClientService.name);

  constructor(private config: ConfigService) {
    // The application_id is sent per request, so the instance carries no credential
    this.http = axios.create({
      baseURL:
        this.config.get<string>('WG_API_BASE_URL') ?? WG_API_DEFAULT_BASE_URL,
      timeout: WG_API_TIMEOUT_MS,
    });
  }

  // -- Public Methods --

  /**
   * Searches clans by tag or name.
   * The search is fuzzy, so results may include clans whose tag only contains `search`.
   * @param search - Text to search for
   * @param credential - Wargaming application_id
   * @returns Raw JSON body
   */
  async searchClans(search: string, credential: string): Promise<unknown> {
    return this.performRequest('/wot/clans/list/', credential, {
      search,
      fields: 'clan_id,tag',
    });
  }

  /**
   * Fetches the tag of a single clan.
   * @param clanId - Clan ID
   * @param credential - Wargaming application_id
   * @returns Raw JSON body
   */
  async getClanInfo(clanId: number, credential: string): Promise<unknown> {
    return this.performRequest('/wot/clans/info/', credential, {
      clan_id: clanId,
      fields: 'tag',
    });
  }

  // -- Private Methods --

  /**
   * Performs a GET against the Wargaming API.
   * Connection errors, timeouts and non-2xx responses are rethrown as-is.
   */
  private async performRequest(
    endpoint: string,
    credential: string,
    params: Record<string, unknown>
  ): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>(endpoint, {
        params: { application_id: credential, ...params },
      });
      return response.data;
    } catch (error) {
      this.logger.error(`Request to ${endpoint} failed`, error);
      throw error;
    }
  }
}
