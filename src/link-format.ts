/**
 * Rewrite Markdown links (`[label](url)`) into Slack mrkdwn (`<url|label>`).
 *
 * The label runs to the first `]` after the opening `[`, even when that `]`
 * sits past the closing `)`; nesting is not validated. Output must stay
 * byte-identical to replies already posted, which the notifier compares
 * against.
 */
export function formatLinks(text: string): string {
  let formatted = text;
  let cursor = 0;

  for (;;) {
    const start = formatted.indexOf('[', cursor);
    if (start === -1) break;
    const end = formatted.indexOf(')', start);
    if (end === -1) break;

    // -1 from indexOf flows into slice() on purpose: a missing `]` cuts the
    // label before the final character, a missing `(` starts the url at 0.
    const label = formatted.slice(start + 1, formatted.indexOf(']', start));
    const url = formatted.slice(formatted.indexOf('(', start) + 1, end);
    const slackLink = `<${url}|${label}>`;

    formatted = formatted.slice(0, start) + slackLink + formatted.slice(end + 1);
    cursor = start + slackLink.length;
  }

  return formatted;
}
