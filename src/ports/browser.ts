import type { PageSnapshot, SolvedToken } from '../domain/models.js';

export type ScreenshotPath = `${string}.png`;

export interface SearchSubmission {
  /** False when the search form was missing; `page` is then the page as loaded. */
  formFound: boolean;
  page: PageSnapshot;
}

export interface BrowserPort {
  open(): Promise<void>;
  close(): Promise<void>;
  /** Loads the registry search form, enters the identifier and submits it. */
  submitSearch(fileNumber: string, timeoutMs: number): Promise<SearchSubmission>;
  /** Places a solved token (or image answer) into the current form and submits it. */
  submitSolution(token: SolvedToken, timeoutMs: number): Promise<PageSnapshot>;
  /** Base64 picture of an image challenge that is not inlined in the page. */
  captureChallengeImage(timeoutMs: number): Promise<string | null>;
  screenshot(filePath: ScreenshotPath, timeoutMs: number): Promise<void>;
}
