export enum EventFilter {
  Upcoming = 'upcoming',
  Past = 'past',
  Free = 'free',
  Recent = 'recent',
}

export const DEFAULT_RECENT_LIMIT = 3;

export enum HowHeard {
  Newsletter = 'Newsletter',
  BlogPost = 'Blog Post',
  Twitter = 'Twitter',
  WebSearch = 'Web Search',
  FriendCoworker = 'Friend/Coworker',
  Other = 'Other',
}

export const IMAGE_FILE_NAME_REGEX = /^.+\.(png|jpg|gif)$/i;

export const EVENT_DESCRIPTION_MIN_LENGTH = 25;

// At least one non-whitespace character.
export const NOT_BLANK_REGEX = /\S/;

export const SIGN_IN_PATH = '/session/new';
