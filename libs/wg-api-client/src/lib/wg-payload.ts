import { z } from 'zod';
import type {
  ClanInfoDTO,
  ClanSearchCandidateDTO,
} from '@clan-lookup/shared-types';

/**
 * Raised when an upstream JSON body does not have the shape the readers expect.
 * `field` is the last key on the path to the offending value.
 */
export class UpstreamPayloadError extends Error {
  constructor(readonly field: string) {
    super(field);
    this.name = new.target.name;
  }
}

// The key is absent from the payload
export class MissingFieldError extends UpstreamPayloadError {}

// The key is present but holds the wrong type
export class InvalidFieldError extends UpstreamPayloadError {}

export type WgEnvelope = { ok: true } | { ok: false; message: string };

const envelopeSchema = z.object({ status: z.string() });

const errorSchema = z.object({
  error: z.object({ message: z.string() }),
});

const candidateSchema: z.ZodType<ClanSearchCandidateDTO> = z.object({
  clan_id: z.number().int(),
  tag: z.string(),
});

// Candidates are only checked in full once they match the tag
const searchSchema = z.object({ data: z.array(z.record(z.unknown())) });

const clanInfoSchema: z.ZodType<ClanInfoDTO> = z.object({
  tag: z.string().nullish(),
});

const infoSchema = z.object({ data: z.record(clanInfoSchema) });

function toPayloadError(error: z.ZodError): UpstreamPayloadError {
  const issue = error.issues[0];
  const key = issue?.path[issue.path.length - 1];
  const field = key === undefined ? 'body' : String(key);

  if (issue?.code === 'invalid_type' && issue.received === 'undefined') {
    return new MissingFieldError(field);
  }
  return new InvalidFieldError(field);
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw toPayloadError(result.error);
  }
  return result.data;
}

/**
 * Reads the `status` discriminator every Wargaming response carries.
 * @param body - Parsed JSON body
 * @returns `ok: false` with the upstream error message when status is not "ok"
 */
export function readEnvelope(body: unknown): WgEnvelope {
  const { status } = parse(envelopeSchema, body);
  if (status === 'ok') {
    return { ok: true };
  }
  return { ok: false, message: parse(errorSchema, body).error.message };
}

/**
 * Finds the first candidate of a /wot/clans/list/ response whose tag equals `tag`.
 * Every candidate must carry a `tag` key; only the match needs a `clan_id`.
 * @param body - Parsed JSON body
 * @param tag - Exact tag to match
 * @returns The matching candidate, or null when none matches
 */
export function findSearchMatch(
  body: unknown,
  tag: string
): ClanSearchCandidateDTO | null {
  const matches = parse(searchSchema, body).data.filter((candidate) => {
    if (!('tag' in candidate)) {
      throw new MissingFieldError('tag');
    }
    return candidate.tag === tag;
  });
  if (matches.length === 0) {
    return null;
  }
  return parse(candidateSchema, matches[0]);
}

/**
 * Reads `data[clanId].tag` of a /wot/clans/info/ response.
 * @param body - Parsed JSON body
 * @param clanId - The id the request was made for
 * @returns The tag, or null when the entry has no tag
 */
export function readClanInfoTag(body: unknown, clanId: number): string | null {
  const { data } = parse(infoSchema, body);
  const key = String(clanId);
  if (!(key in data)) {
    throw new MissingFieldError(key);
  }
  return data[key].tag ?? null;
}
