export const defaultReelNameLength = 8;

// CMX 3600 reel names are short alphanumeric tokens. maxLength <= 0 disables truncation.
export function sanitizeReelName(name: string, maxLength = defaultReelNameLength) {
  const replaced = name.replaceAll(/[^\w]/gu, '_');
  const truncated = maxLength > 0 ? replaced.slice(0, maxLength) : replaced;
  return truncated || 'AX';
}
