import { Module } from '@nestjs/common';
import { HierarchyCacheService } from './hierarchy-cache.service';
import { HierarchyController } from './hierarchy.controller';
import { HierarchyService } from './hierarchy.service';

@Module({
  controllers: [HierarchyController],
  providers: [HierarchyService, HierarchyCacheService],
  exports: [HierarchyService, HierarchyCacheService],
})
export class HierarchyModule {}
