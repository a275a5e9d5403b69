import { type ProviderResult, type RentProvider } from '../core/ports.js';
import { getNested, isRecord } from '../core/normalize.js';
import { ProviderUnavailableError } from '../errors.js';
import { getEnv } from '../env.js';
import { buildUrl, getJson, missingKey } from './http.js';

/** First dollar-ish figure in a snippet: "$1,450" -> 1450, "1,450 - 1,800" -> 1450. */
export function parseRentFigure(text: string): number | undefined {
  const match = /\d[\d,]*(?:\.\d+)?/.exec(text);
  if (!match) return undefined;
  const n = Number(match[0].replace(/,/g, ''));
  return Number.isFinite(n) && n > 0 ? Math.round(n) : undefined;
}

export function extractAverageRent(payload: unknown): number | undefined {
  if (!isRecord(payload)) return undefined;
  const answerBox = getNested(payload, 'answer_box');
  if (!answerBox) return undefined;

  const highlighted = answerBox.snippet_highlighted_words;
  if (Array.isArray(highlighted)) {
    for (const word of highlighted) {
      if (typeof word !== 'string') continue;
      const rent = parseRentFigure(word);
      if (rent !== undefined) return rent;
    }
  }

  const answer = answerBox.answer;
  return typeof answer === 'string' ? parseRentFigure(answer) : undefined;
}

/** Average rent for a bedroom count in a ZIP code, read off a Google answer box. */
export async function fetchAverageRent(zipcode: string, bedrooms: number): Promise<ProviderResult<number>> {
  const env = getEnv();
  if (!env.SERPAPI_KEY) return { status: 'failed', error: missingKey('serpapi', 'SERPAPI_KEY') };

  const url = buildUrl(env.SERPAPI_BASE_URL, '/search.json', {
    q: `average rent for ${bedrooms} bedroom home in ${zipcode}`,
    api_key: env.SERPAPI_KEY,
    hl: 'en',
    gl: 'us'
  });

  const outcome = await getJson('serpapi', url, {}, env.PROVIDER_TIMEOUT_MS);
  if (!outcome.ok) return { status: 'failed', error: outcome.error };

  if (!isRecord(outcome.data)) {
    return { status: 'failed', error: new ProviderUnavailableError('serpapi', 'serpapi returned a malformed payload') };
  }

  const rent = extractAverageRent(outcome.data);
  return rent === undefined ? { status: 'empty' } : { status: 'ok', items: [rent] };
}

export const serpApiRents: RentProvider = { fetchAverageRent };
