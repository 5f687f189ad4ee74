import { parseHTML } from 'linkedom';
import type { PageSnapshot } from '../domain/models.js';
import { CHALLENGE_KINDS, PAGE_KINDS, type ChallengeKindValue } from '../constants.js';
import { looksLikeResults } from './normalizer.js';

export interface ChallengeMaterial {
  kind: ChallengeKindValue;
  siteKey?: string;
  imageBase64?: string;
}

export type PageClassification =
  | { kind: typeof PAGE_KINDS.CHALLENGE; challenge: ChallengeMaterial; rejected: boolean }
  | { kind: typeof PAGE_KINDS.RESULTS }
  | { kind: typeof PAGE_KINDS.NOT_FOUND }
  | { kind: typeof PAGE_KINDS.RATE_LIMITED }
  | { kind: typeof PAGE_KINDS.UNKNOWN };

const THROTTLE_STATUSES = new Set([429]);

const THROTTLE_PATTERNS = [
  /too many requests/i,
  /rate[- ]limit(ed|ing)?/i,
  /temporarily (blocked|restricted)/i,
  /request limit (has been )?(exceeded|reached)/i
];

const NOT_FOUND_PATTERNS = [
  /no (matching )?(records?|results?|entit(y|ies)|llcs?|business(es)?) (were |was )?found/i,
  /(file number|entity|record) (you entered )?(does not|did not) (exist|match)/i,
  /not found in (our|the) (records|database)/i
];

const REJECTED_TOKEN_PATTERNS = [
  /captcha (verification |validation )?(failed|invalid|incorrect|expired)/i,
  /(invalid|incorrect|expired) (captcha|verification code)/i,
  /please (complete|verify) the captcha/i
];

const WIDGETS: readonly { selector: string; kind: ChallengeKindValue }[] = [
  { selector: '.g-recaptcha[data-sitekey]', kind: CHALLENGE_KINDS.RECAPTCHA_V2 },
  { selector: '.h-captcha[data-sitekey]', kind: CHALLENGE_KINDS.HCAPTCHA },
  { selector: '.cf-turnstile[data-sitekey]', kind: CHALLENGE_KINDS.TURNSTILE }
];

const DATA_URL_PATTERN = /^data:image\/[a-z+]+;base64,(.+)$/i;

function detectChallenge(document: Document): ChallengeMaterial | null {
  for (const widget of WIDGETS) {
    const siteKey = document.querySelector(widget.selector)?.getAttribute('data-sitekey')?.trim();
    if (siteKey) {
      return { kind: widget.kind, siteKey };
    }
  }

  // Bare data-sitekey without a vendor class: assume reCAPTCHA, the registry default
  const bareKey = document.querySelector('[data-sitekey]')?.getAttribute('data-sitekey')?.trim();
  if (bareKey) {
    return { kind: CHALLENGE_KINDS.RECAPTCHA_V2, siteKey: bareKey };
  }

  for (const image of Array.from(document.querySelectorAll('img'))) {
    const marker = `${image.getAttribute('id') ?? ''} ${image.getAttribute('alt') ?? ''} ${image.getAttribute('src') ?? ''}`;
    if (!/captcha/i.test(marker)) continue;

    const inline = DATA_URL_PATTERN.exec(image.getAttribute('src') ?? '');
    // Picture served by URL: the browser captures it later
    return inline ? { kind: CHALLENGE_KINDS.IMAGE, imageBase64: inline[1] } : { kind: CHALLENGE_KINDS.IMAGE };
  }

  return null;
}

/**
 * Decides what kind of registry page a snapshot shows. Throttling wins over
 * everything, then known results layouts, then "not found", then challenges.
 * A results page may mention "no records found" in a sub-section, and a
 * not-found reply may show the search form again with its widget.
 */
export function classifyPage(page: PageSnapshot): PageClassification {
  const { document } = parseHTML(page.html);
  const text = document.body?.textContent ?? '';

  if ((page.status !== null && THROTTLE_STATUSES.has(page.status)) || THROTTLE_PATTERNS.some(p => p.test(text))) {
    return { kind: PAGE_KINDS.RATE_LIMITED };
  }

  if (looksLikeResults(page.html)) {
    return { kind: PAGE_KINDS.RESULTS };
  }

  if (NOT_FOUND_PATTERNS.some(p => p.test(text))) {
    return { kind: PAGE_KINDS.NOT_FOUND };
  }

  const challenge = detectChallenge(document);
  if (challenge) {
    return {
      kind: PAGE_KINDS.CHALLENGE,
      challenge,
      rejected: REJECTED_TOKEN_PATTERNS.some(p => p.test(text))
    };
  }

  return { kind: PAGE_KINDS.UNKNOWN };
}
