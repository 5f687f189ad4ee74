import { describe, it, expect } from 'vitest';
import { classifyPage } from './page-classifier.js';
import { loadFixture } from './__fixtures__/load.js';
import type { PageSnapshot } from '../domain/models.js';

function page(fixture: string, status: number | null = 200): PageSnapshot {
  return { url: 'https://registry.test/llcarprg/search', html: loadFixture(fixture), status };
}

describe('classifyPage', () => {
  it('should recognise a results page', () => {
    expect(classifyPage(page('results-acme'))).toEqual({ kind: 'results' });
  });

  it('should recognise a not-found message', () => {
    expect(classifyPage(page('not-found'))).toEqual({ kind: 'not_found' });
  });

  it('should keep a results page that reports an empty sub-section as results', () => {
    const html = loadFixture('results-no-managers')
      .replace('</table>', '</table>\n  <h2>Assumed Names</h2>\n  <p>No records found.</p>');
    expect(classifyPage({ url: 'https://registry.test/', html, status: 200 })).toEqual({ kind: 'results' });
  });

  it('should report not found even when the form shows its widget again', () => {
    const html = loadFixture('not-found')
      .replace('</form>', '<div class="g-recaptcha" data-sitekey="test-site-key"></div></form>');
    expect(classifyPage({ url: 'https://registry.test/', html, status: 200 })).toEqual({ kind: 'not_found' });
  });

  it('should extract the site key of a reCAPTCHA widget', () => {
    expect(classifyPage(page('recaptcha-challenge'))).toEqual({
      kind: 'challenge',
      challenge: { kind: 'recaptcha_v2', siteKey: 'test-site-key' },
      rejected: false
    });
  });

  it('should flag a challenge shown again after a rejected token', () => {
    const result = classifyPage(page('token-rejected'));
    expect(result.kind).toBe('challenge');
    expect(result.kind === 'challenge' && result.rejected).toBe(true);
  });

  it('should take an inlined image challenge from its data URL', () => {
    expect(classifyPage(page('image-challenge'))).toEqual({
      kind: 'challenge',
      challenge: { kind: 'image', imageBase64: 'aW1hZ2UtYnl0ZXM=' },
      rejected: false
    });
  });

  it('should leave a linked image challenge for the browser to capture', () => {
    const html = '<html><body><form><img src="/llcarprg/captcha.jpg"><input name="captcha"></form></body></html>';
    expect(classifyPage({ url: 'https://registry.test/', html, status: 200 })).toEqual({
      kind: 'challenge',
      challenge: { kind: 'image' },
      rejected: false
    });
  });

  it('should recognise hCaptcha widgets by class', () => {
    const html = '<html><body><div class="h-captcha" data-sitekey="test-hcaptcha-key"></div></body></html>';
    const result = classifyPage({ url: 'https://registry.test/', html, status: 200 });
    expect(result).toEqual({
      kind: 'challenge',
      challenge: { kind: 'hcaptcha', siteKey: 'test-hcaptcha-key' },
      rejected: false
    });
  });

  it('should report throttling from the page text', () => {
    expect(classifyPage(page('rate-limited'))).toEqual({ kind: 'rate_limited' });
  });

  it('should report throttling from HTTP 429 even on a results page', () => {
    expect(classifyPage(page('results-acme', 429))).toEqual({ kind: 'rate_limited' });
  });

  it('should return unknown for unrecognised markup', () => {
    expect(classifyPage(page('unknown-layout', null))).toEqual({ kind: 'unknown' });
  });
});
