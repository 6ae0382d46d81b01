import { Global, Logger, Module, OnApplicationShutdown } from '@nestjs/common';
import { ModuleRef } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Redis } from 'ioredis';
import { REDIS_CLIENT } from './redis.constants';

@Global()
@Module({
  providers: [
    {
      provide: REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const logger = new Logger('RedisModule');
        const client = new Redis(
          configService.get<string>('REDIS_URL', 'redis://localhost:6379'),
          { lazyConnect: true, maxRetriesPerRequest: 3 },
        );
        client.on('error', (err: Error) =>
          logger.error(`Redis error: ${err.message}`),
        );
        return client;
      },
    },
  ],
  exports: [REDIS_CLIENT],
})
export class RedisModule implements OnApplicationShutdown {
  constructor(private readonly moduleRef: ModuleRef) {}

  async onApplicationShutdown() {
    const client = this.moduleRef.get<Redis>(REDIS_CLIENT);
    // lazyConnect: a client that never sent a command has nothing to quit
    if (client.status === 'wait') {
      client.disconnect();
      return;
    }
    await client.quit();
  }
}
