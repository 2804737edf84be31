import { CollectionNotFoundError } from '../errors';
import { SORT_MODES, TIME_FILTERS } from '../types';
import type { RedditPost, SortMode, TimeFilter } from '../types';
import type { RedditClient, RedditSubmission } from './client';

export const MAX_POSTS = 50;
export const SELFTEXT_PREVIEW_LENGTH = 200;
export const PERMALINK_BASE = 'https://reddit.com';
export const DELETED_AUTHOR = '[deleted]';

export interface FetchPostsArgs {
  subreddit: string;
  sort?: string;
  time_filter?: string;
  limit: number;
}

export function normalizeSort(sort: string | undefined): SortMode {
  const match = SORT_MODES.find((mode) => mode === sort);
  return match ?? 'hot';
}

export function normalizeTimeFilter(time: string | undefined): TimeFilter {
  const match = TIME_FILTERS.find((value) => value === time);
  return match ?? 'week';
}

export function clampLimit(limit: number): number {
  return Math.min(limit, MAX_POSTS);
}

/**
 * Fetch up to `limit` (max 50) posts from a subreddit in the order Reddit
 * returns them. The time window only applies to `top`.
 */
export async function fetchPosts(client: RedditClient, args: FetchPostsArgs): Promise<RedditPost[]> {
  const sort = normalizeSort(args.sort);
  const limit = clampLimit(args.limit);

  const exists = await client.subredditExists(args.subreddit);
  if (!exists) throw new CollectionNotFoundError(args.subreddit);

  const submissions = await client.listing(args.subreddit, sort, {
    limit,
    time: sort === 'top' ? normalizeTimeFilter(args.time_filter) : undefined,
  });

  return submissions.slice(0, Math.max(0, limit)).map((submission) => toPost(submission, args.subreddit));
}

export function toPost(submission: RedditSubmission, subreddit: string): RedditPost {
  return {
    id: submission.id,
    title: submission.title,
    score: submission.score,
    url: submission.url,
    permalink: `${PERMALINK_BASE}${submission.permalink}`,
    created_utc: submission.created_utc,
    author: submission.author ? submission.author : DELETED_AUTHOR,
    subreddit,
    num_comments: submission.num_comments,
    upvote_ratio: submission.upvote_ratio ?? 0,
    selftext: submission.selftext ? submission.selftext.slice(0, SELFTEXT_PREVIEW_LENGTH) : '',
    is_video: submission.is_video ?? false,
    over_18: submission.over_18 ?? false,
  };
}
