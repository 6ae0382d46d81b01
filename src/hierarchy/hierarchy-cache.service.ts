import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Redis } from 'ioredis';
import { REDIS_CLIENT } from '../redis/redis.constants';
import { HierarchyTraversal } from './hierarchy.types';

@Injectable()
export class HierarchyCacheService {
  private readonly logger = new Logger(HierarchyCacheService.name);
  private readonly TRAVERSAL_PREFIX = 'hierarchy:traversal:';
  private readonly ttlSeconds: number;

  constructor(
    @Inject(REDIS_CLIENT) private readonly redis: Redis,
    configService: ConfigService,
  ) {
    this.ttlSeconds = Number(
      configService.get<string>('HIERARCHY_CACHE_TTL', '3600'),
    );
  }

  private key(conceptId: number, maxLevelsUp: number, maxLevelsDown: number) {
    return `${this.TRAVERSAL_PREFIX}${conceptId}:${maxLevelsUp}:${maxLevelsDown}`;
  }

  // A cache outage degrades to recomputing; it never fails the request
  async getTraversal(
    conceptId: number,
    maxLevelsUp: number,
    maxLevelsDown: number,
  ): Promise<HierarchyTraversal | null> {
    try {
      const cached = await this.redis.get(
        this.key(conceptId, maxLevelsUp, maxLevelsDown),
      );
      if (!cached) return null;
      const parsed: HierarchyTraversal = JSON.parse(cached);
      return parsed;
    } catch (error) {
      this.logger.warn(`Hierarchy cache read failed: ${String(error)}`);
      return null;
    }
  }

  async setTraversal(traversal: HierarchyTraversal): Promise<void> {
    try {
      await this.redis.setex(
        this.key(
          traversal.conceptId,
          traversal.maxLevelsUp,
          traversal.maxLevelsDown,
        ),
        this.ttlSeconds,
        JSON.stringify(traversal),
      );
    } catch (error) {
      this.logger.warn(`Hierarchy cache write failed: ${String(error)}`);
    }
  }

  /** Drops every cached traversal, e.g. after a vocabulary import. */
  async invalidateAll(): Promise<number> {
    const stream = this.redis.scanStream({
      match: `${this.TRAVERSAL_PREFIX}*`,
      count: 500,
    });

    let removed = 0;
    for await (const keys of stream) {
      if (!Array.isArray(keys) || keys.length === 0) continue;
      const batch = keys.filter((k): k is string => typeof k === 'string');
      if (batch.length > 0) {
        removed += await this.redis.del(...batch);
      }
    }
    return removed;
  }
}
