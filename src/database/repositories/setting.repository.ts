import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../../db/database.service';

export const SettingKeys = {
  OHDSI_MAPPINGS_LAST_SYNC: 'ohdsi_mappings_last_sync',
} as const;

export type SettingKey = (typeof SettingKeys)[keyof typeof SettingKeys];

@Injectable()
export class SettingRepository {
  constructor(private readonly databaseService: DatabaseService) {}

  async get(key: SettingKey): Promise<string | null> {
    const row = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('appSetting')
        .select('settingValue')
        .where('settingKey', '=', key)
        .executeTakeFirst(),
    );
    return row?.settingValue ?? null;
  }

  async set(key: SettingKey, value: string): Promise<void> {
    // delete + insert keeps the upsert portable across MySQL and SQLite
    await this.databaseService.db
      .write()
      .transaction()
      .execute(async (trx) => {
        await trx.deleteFrom('appSetting').where('settingKey', '=', key).execute();
        await trx
          .insertInto('appSetting')
          .values({ settingKey: key, settingValue: value })
          .execute();
      });
  }
}
