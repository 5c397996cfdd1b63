export interface AuthorizationScope {
  readonly allowedOriginIds: ReadonlySet<string>;
  readonly allowedChannelIds: ReadonlySet<string>;
  // Empty means any author in an allowed channel.
  readonly allowedAuthorIds: ReadonlySet<string>;
  readonly replyOnDenied: boolean;
}

export interface AccessConfig {
  allowedGuilds?: string[];
  allowedChannels?: string[];
  allowedUsers?: string[];
  replyOnDenied?: boolean;
}

function toIdSet(ids: string[] | undefined): ReadonlySet<string> {
  return new Set((ids ?? []).map((id) => id.trim()).filter(Boolean));
}

export function createAuthorizationScope(config: AccessConfig = {}): AuthorizationScope {
  return Object.freeze({
    allowedOriginIds: toIdSet(config.allowedGuilds),
    allowedChannelIds: toIdSet(config.allowedChannels),
    allowedAuthorIds: toIdSet(config.allowedUsers),
    replyOnDenied: config.replyOnDenied ?? false,
  });
}

/**
 * Both the origin (server) and the channel must be allow-listed. An empty
 * origin or channel list denies everything.
 */
export function isAllowed(
  scope: AuthorizationScope,
  originId: string | undefined,
  channelId: string,
  authorId?: string,
): boolean {
  if (scope.allowedOriginIds.size === 0 || scope.allowedChannelIds.size === 0) {
    return false;
  }
  if (!originId || !scope.allowedOriginIds.has(originId)) {
    return false;
  }
  if (!scope.allowedChannelIds.has(channelId)) {
    return false;
  }
  if (scope.allowedAuthorIds.size === 0) {
    return true;
  }
  return authorId !== undefined && scope.allowedAuthorIds.has(authorId);
}
