import { load } from "cheerio";

const CAPTCHA_MARKER = /captcha/i;

function sanitize(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Returns a human-readable reason when `body` is a CAPTCHA challenge page.
 * JSON bodies are never treated as challenges, whatever their content.
 */
export function detectCaptcha(body: string): string | undefined {
  const trimmed = body.trimStart();
  if (trimmed.startsWith("{") || trimmed.startsWith("[")) {
    return undefined;
  }
  if (!CAPTCHA_MARKER.test(body)) {
    return undefined;
  }

  const $ = load(body);
  const title = sanitize($("title").first().text());
  if (title) {
    return `CAPTCHA page served: ${title}`;
  }
  return $("iframe[src*='recaptcha'], .g-recaptcha").length > 0
    ? "reCAPTCHA challenge served"
    : "CAPTCHA challenge detected in response body";
}
