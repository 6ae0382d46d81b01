import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from './database/database.module';
import { EnrichmentModule } from './enrichment/enrichment.module';
import { HealthController } from './health.controller';
import { HierarchyModule } from './hierarchy/hierarchy.module';
import { MappingsModule } from './mappings/mappings.module';
import { RedisModule } from './redis/redis.module';
import { VocabularyModule } from './vocabulary/vocabulary.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    DatabaseModule,
    RedisModule,
    VocabularyModule,
    HierarchyModule,
    MappingsModule,
    EnrichmentModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
