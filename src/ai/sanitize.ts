// Replies are shown as plain prose, so markdown markup is stripped.

const HEADING = /^[ \t]*#{1,6}[ \t]+/gm;
const BULLET = /^([ \t]*)[-*+][ \t]+/gm;
const BOLD_STARS = /\*\*(.+?)\*\*/g;
const BOLD_UNDERSCORES = /__(.+?)__/g;
const ITALIC_STAR = /\*([^*\n]+)\*/g;
const ITALIC_UNDERSCORE = /(?<![\w])_([^_\n]+)_(?![\w])/g;
const INLINE_CODE = /`([^`\n]+)`/g;
const EXTRA_BLANK_LINES = /\n{3,}/g;

export function stripMarkdown(reply: string): string {
  return reply
    .replace(HEADING, '')
    .replace(BULLET, '$1')
    .replace(BOLD_STARS, '$1')
    .replace(BOLD_UNDERSCORES, '$1')
    .replace(ITALIC_STAR, '$1')
    .replace(ITALIC_UNDERSCORE, '$1')
    .replace(INLINE_CODE, '$1')
    .replace(EXTRA_BLANK_LINES, '\n\n')
    .trim();
}
