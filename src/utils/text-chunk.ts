/**
 * Text chunking for replies that exceed a chat platform's message limit.
 */

const DEFAULT_CHUNK_LIMIT = 4000;
const FENCE = "```";

/**
 * Split text into chunks respecting the given limit.
 * Prefers breaking at natural boundaries (newlines, spaces). A code block cut
 * in two is closed at the end of one chunk and reopened at the start of the next.
 */
export function chunkText(text: string, limit = DEFAULT_CHUNK_LIMIT): string[] {
  if (!text) {
    return [];
  }
  if (limit <= 0 || text.length <= limit) {
    return [text];
  }

  // Room for a closing fence plus a reopening fence on the following chunk.
  const hasFences = text.includes(FENCE);
  const budget = hasFences ? Math.max(1, limit - (FENCE.length + 1) * 2) : limit;

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > budget) {
    const window = remaining.slice(0, budget);
    const breakpoint = findBestBreakpoint(window, budget);
    const breakIdx = breakpoint > 0 ? breakpoint : budget;

    const chunk = remaining.slice(0, breakIdx).trimEnd();
    if (chunk.length > 0) {
      chunks.push(chunk);
    }

    const brokeOnSeparator = breakIdx < remaining.length && /\s/.test(remaining[breakIdx] ?? "");
    const nextStart = Math.min(remaining.length, breakIdx + (brokeOnSeparator ? 1 : 0));
    remaining = remaining.slice(nextStart).trimStart();
  }

  if (remaining.length > 0) {
    chunks.push(remaining);
  }

  return hasFences ? balanceCodeFences(chunks) : chunks;
}

function balanceCodeFences(chunks: string[]): string[] {
  const balanced: string[] = [];
  let open = false;
  for (const chunk of chunks) {
    let next: string = open ? `${FENCE}\n${chunk}` : chunk;
    const fenceCount = next.split(FENCE).length - 1;
    open = fenceCount % 2 === 1;
    if (open) {
      next = `${next}\n${FENCE}`;
    }
    balanced.push(next);
  }
  return balanced;
}

/**
 * Find the best breakpoint index within the window.
 * Priority: paragraph break > line break > word boundary
 */
function findBestBreakpoint(window: string, limit: number): number {
  const paragraphBreak = window.lastIndexOf("\n\n");
  if (paragraphBreak > limit * 0.5) {
    return paragraphBreak + 2;
  }

  const lineBreak = window.lastIndexOf("\n");
  if (lineBreak > limit * 0.3) {
    return lineBreak + 1;
  }

  const lastSpace = window.lastIndexOf(" ");
  if (lastSpace > limit * 0.3) {
    return lastSpace + 1;
  }

  return limit;
}

/**
 * Channel-specific text limits.
 */
export const CHANNEL_TEXT_LIMITS = {
  discord: 2000,
  default: 4000,
} as const;

export type ChannelId = keyof typeof CHANNEL_TEXT_LIMITS;

function isKnownChannel(id: string): id is ChannelId {
  return Object.hasOwn(CHANNEL_TEXT_LIMITS, id);
}

/**
 * Get the text chunk limit for a specific channel.
 */
export function getChannelTextLimit(channelId: string): number {
  const id = channelId.toLowerCase();
  return isKnownChannel(id) ? CHANNEL_TEXT_LIMITS[id] : CHANNEL_TEXT_LIMITS.default;
}
