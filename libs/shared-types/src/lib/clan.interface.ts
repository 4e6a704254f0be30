/**
 * A clan as returned by this service: the numeric id and short tag, always together.
 */
export interface ClanRecord {
  clan_id: number;
  clan_tag: string;
}

// Element of `data` in /wot/clans/list/ when requested with fields=clan_id,tag
export interface ClanSearchCandidateDTO {
  clan_id: number;
  tag: string;
}

// Value of `data[clan_id]` in /wot/clans/info/ when requested with fields=tag
export interface ClanInfoDTO {
  tag?: string | null;
}
