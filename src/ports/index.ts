export type { BrowserPort, ScreenshotPath, SearchSubmission } from './browser.js';
export type { CaptchaPort } from './captcha.js';
