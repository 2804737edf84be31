import type { RewrittenPost, ScrapedPost } from './clients/scraperApi';

// Telegram rejects messages over 4096 characters
export const MAX_MESSAGE_LENGTH = 4000;
export const PREVIEW_COUNT = 5;
export const PREVIEW_TITLE_LENGTH = 80;

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export const welcome = () =>
  '👋 Welcome to Reddit Scraper!\n\n' +
  'Use /scrape to fetch Reddit posts.\n' +
  'Example: <code>/scrape python 10 top week</code>';

export const help = () =>
  '<b>Commands</b>\n' +
  '/scrape [subreddit] [limit] [sort] [time_filter] - fetch posts\n' +
  '/help - show this message\n\n' +
  '<b>sort</b>: hot, new, top, rising\n' +
  '<b>time_filter</b>: hour, day, week, month, year, all (used with top)\n' +
  '<b>limit</b>: 1-50\n\n' +
  'After a scrape, reply with rewrite instructions or <code>skip</code>.';

export const usage = () =>
  '🤔 I need more info to scrape Reddit!\n\n' +
  '💡 Try: <code>/scrape python 10 top week</code>\n\n' +
  'Format: /scrape [subreddit] [limit] [sort] [time_filter]';

export const accessDenied = (contact: string) =>
  `❌ Access denied. Please contact ${escapeHtml(contact)} to request access.`;

export const invalidLimit = () => '❌ Invalid number. Use 1-50.';

export const rateLimited = (retryAfterSeconds: number) =>
  `⏳ Slow down! Try again in ${retryAfterSeconds}s.`;

export const scraping = (subreddit: string, limit: number, sort: string) =>
  `🔍 <b>Scraping r/${escapeHtml(subreddit)}...</b>\n📊 Fetching ${limit} ${escapeHtml(sort)} posts...`;

export const noPosts = (subreddit: string) => `❌ No posts found in r/${escapeHtml(subreddit)}`;

export const subredditNotFound = (subreddit: string) => `❌ r/${escapeHtml(subreddit)} does not exist.`;

export const scrapeError = (subreddit: string) =>
  `❌ Error scraping r/${escapeHtml(subreddit)}\nPlease try again later.`;

export function preview(posts: ScrapedPost[]): string {
  const lines = posts
    .slice(0, PREVIEW_COUNT)
    .map((post, i) => `${i + 1}. ${escapeHtml(truncate(post.title, PREVIEW_TITLE_LENGTH))}`);
  let text = '✅ <b>Successfully scraped!</b>\n\n<b>Preview:</b>\n' + lines.join('\n') + '\n';
  if (posts.length > PREVIEW_COUNT) {
    text += `\n<i>...and ${posts.length - PREVIEW_COUNT} more posts</i>`;
  }
  return text;
}

export const askInstructions = () =>
  '🤖 Would you like to rewrite these titles with AI?\n\n' +
  "Reply with instructions (e.g., 'Make them more clickbait')\n" +
  "or type 'skip' to keep originals.";

export const sendingToWorkflow = () => '📤 Sending to n8n workflow...';

export const workflowDone = (message: string | undefined) => `✅ ${escapeHtml(message ?? 'Processing complete!')}`;

export const workflowError = () => '⚠️ Error sending to n8n. Please try again later.';

export const rewriting = (count: number) => `✍️ Rewriting ${count} titles...`;

export const rewriteError = () => '⚠️ Could not rewrite the titles. Please try again later.';

/** Splits numbered lines into messages that fit Telegram's size limit. */
export function chunkLines(header: string, lines: string[], max = MAX_MESSAGE_LENGTH): string[] {
  const messages: string[] = [];
  let current = header;
  for (const line of lines) {
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length > max && current) {
      messages.push(current);
      current = line;
    } else {
      current = candidate;
    }
  }
  if (current) messages.push(current);
  return messages;
}

export function originalTitles(posts: ScrapedPost[]): string[] {
  return chunkLines(
    '✅ <b>Keeping original titles:</b>\n',
    posts.map((post, i) => `${i + 1}. <a href="${escapeHtml(post.permalink)}">${escapeHtml(post.title)}</a>`),
  );
}

export function rewrittenTitles(posts: RewrittenPost[]): string[] {
  const failed = posts.filter((post) => post.ai_error !== undefined).length;
  const header =
    '✅ <b>Rewritten titles:</b>\n' + (failed > 0 ? `<i>${failed} kept their original title (AI unavailable)</i>\n` : '');
  return chunkLines(
    header,
    posts.map((post, i) => `${i + 1}. <a href="${escapeHtml(post.permalink)}">${escapeHtml(post.ai_title)}</a>`),
  );
}
