import { Global, Module } from '@nestjs/common';
import { DatabaseService } from '../db/database.service';
import {
  MappingHistoryRepository,
  MappingRepository,
  SettingRepository,
  VocabularyRepository,
} from './repositories';

@Global()
@Module({
  providers: [
    DatabaseService,
    VocabularyRepository,
    MappingRepository,
    MappingHistoryRepository,
    SettingRepository,
  ],
  exports: [
    DatabaseService,
    VocabularyRepository,
    MappingRepository,
    MappingHistoryRepository,
    SettingRepository,
  ],
})
export class DatabaseModule {}
