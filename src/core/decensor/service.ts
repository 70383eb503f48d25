// src/core/decensor/service.ts
import type { Logger } from 'pino';
import type { DecensoredPost, Post, ResolvedIdentity } from '../types/index.js';
import { buildMediaUrls } from './urls.js';

export interface IdentityResolver {
  find(postId: number): Promise<ResolvedIdentity | null>;
}

export interface DecensorServiceOptions {
  resolver: IdentityResolver;
  siteUrl: string;
  logger: Logger;
}

export function isCensored(post: Post): boolean {
  return !('md5' in post);
}

/**
 * Fills in the media fields of censored posts. Best effort: a post that
 * cannot be resolved, for whatever reason, comes back unchanged.
 */
export class DecensorService {
  constructor(private options: DecensorServiceOptions) {}

  async decensor(post: Post): Promise<Post | DecensoredPost> {
    if (!isCensored(post)) {
      return post;
    }

    const { resolver, siteUrl, logger } = this.options;

    let identity: ResolvedIdentity | null;
    try {
      identity = await resolver.find(post.id);
    } catch (error) {
      logger.warn({ postId: post.id, err: error }, 'could not resolve censored post');
      return post;
    }

    if (!identity) {
      logger.debug({ postId: post.id }, 'censored post not in dataset');
      return post;
    }

    return {
      ...post,
      file_ext: identity.ext,
      md5: identity.md5,
      ...buildMediaUrls(post, identity, siteUrl),
    };
  }

  async *decensorIter(posts: Iterable<Post> | AsyncIterable<Post>): AsyncGenerator<Post | DecensoredPost> {
    for await (const post of posts) {
      yield await this.decensor(post);
    }
  }
}
