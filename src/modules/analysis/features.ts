import { charCount, wordCount } from '../../utils/format.js';

export interface ContentFeatures {
  wordCount: number;
  characterCount: number;
  /** Runs of `.`, `!` or `?`, not sentences. "Wow!!! Really?" has 2. */
  sentenceCount: number;
  emojiCount: number;
  hashtagCount: number;
  mentionCount: number;
  urlCount: number;
  questionMarks: number;
  exclamationMarks: number;
  ctaPresent: boolean;
  questionPresent: boolean;
}

export const CTA_PHRASES = [
  'comment', 'share', 'like', 'follow', 'subscribe', 'save',
  'tag', 'dm', 'click', 'swipe', 'link in bio',
];

const SENTENCE_END = /[.!?]+/g;
// Emoticons, symbols & pictographs, transport & map, regional indicator flags
const EMOJI = /[\u{1F600}-\u{1F64F}\u{1F300}-\u{1F5FF}\u{1F680}-\u{1F6FF}\u{1F1E0}-\u{1F1FF}]/gu;
// Word characters are letters, digits and underscore in any script
const HASHTAG = /#[\p{L}\p{N}_]+/gu;
const MENTION = /@[\p{L}\p{N}_]+/gu;
const URL_TOKEN = /https?:\/\/(?:[a-zA-Z]|[0-9]|[$-_@.&+]|[!*(),]|(?:%[0-9a-fA-F][0-9a-fA-F]))+/g;

function countMatches(text: string, pattern: RegExp): number {
  return (text.match(pattern) ?? []).length;
}

export function extractFeatures(text: string): ContentFeatures {
  const lower = text.toLowerCase();

  return {
    wordCount: wordCount(text),
    characterCount: charCount(text),
    sentenceCount: countMatches(text, SENTENCE_END),
    emojiCount: countMatches(text, EMOJI),
    hashtagCount: countMatches(text, HASHTAG),
    mentionCount: countMatches(text, MENTION),
    urlCount: countMatches(text, URL_TOKEN),
    questionMarks: countMatches(text, /\?/g),
    exclamationMarks: countMatches(text, /!/g),
    ctaPresent: CTA_PHRASES.some((phrase) => lower.includes(phrase)),
    questionPresent: text.includes('?'),
  };
}
