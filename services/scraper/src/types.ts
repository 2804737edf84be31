export type TelegramId = number;

export const SORT_MODES = ['hot', 'new', 'top', 'rising'] as const;
export type SortMode = (typeof SORT_MODES)[number];

export const TIME_FILTERS = ['hour', 'day', 'week', 'month', 'year', 'all'] as const;
export type TimeFilter = (typeof TIME_FILTERS)[number];

/** One post as returned to callers. Never persisted. */
export interface RedditPost {
  id: string;
  title: string;
  score: number;
  url: string;
  permalink: string;
  created_utc: number;
  author: string;
  subreddit: string;
  num_comments: number;
  upvote_ratio: number;
  selftext: string;
  is_video: boolean;
  over_18: boolean;
}

export interface AIEnhancedPost extends RedditPost {
  original_title: string;
  ai_title: string;
  personality_used: string;
  ai_error?: string;
}

export interface UserRecord {
  telegram_id: TelegramId;
  username?: string;
  first_name?: string;
  created_at: number;
  is_active: boolean;
}

export interface UserProfile {
  username?: string;
  first_name?: string;
}

export interface Personality {
  user_id: TelegramId;
  name: string;
  description: string;
  prompt_template: string;
  temperature: number;
  max_tokens: number;
  is_default: boolean;
  created_at: number;
}

// Use a separate type for write inputs (defaults filled by the store)
export interface CreatePersonalityArgs {
  name: string;
  description?: string;
  prompt_template: string;
  temperature?: number;
  max_tokens?: number;
  is_default?: boolean;
}

export type TaskStatus = 'completed' | 'failed';

export interface ScrapeResponse {
  task_id: string;
  status: TaskStatus;
  message: string;
  telegram_id: TelegramId | null;
  results: Array<RedditPost | AIEnhancedPost> | null;
}
