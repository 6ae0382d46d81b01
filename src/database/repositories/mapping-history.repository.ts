import { Injectable } from '@nestjs/common';
import { Selectable } from 'kysely';
import { DatabaseService } from '../../db/database.service';
import { MappingHistoryTable } from '../../db/types';
import { HistoryAction, MappingHistoryEntry } from './domain.types';

function toAction(actionType: string): HistoryAction {
  for (const action of Object.values(HistoryAction)) {
    if (action === actionType) return action;
  }
  throw new Error(`Unknown history action: ${actionType}`);
}

@Injectable()
export class MappingHistoryRepository {
  constructor(private readonly databaseService: DatabaseService) {}

  async record(entry: MappingHistoryEntry): Promise<MappingHistoryEntry> {
    const result = await this.databaseService.db
      .write()
      .insertInto('mappingHistory')
      .values({
        createdAt: entry.createdAt,
        actionType: entry.action,
        generalConceptId: entry.generalConceptId,
        omopConceptId: entry.omopConceptId,
        vocabularyId: entry.vocabularyId,
        conceptCode: entry.conceptCode,
        conceptName: entry.conceptName,
        comment: entry.comment,
      })
      .executeTakeFirst();

    return { ...entry, historyId: Number(result.insertId) };
  }

  /** Newest first. */
  async list(
    options: { generalConceptId?: number; limit?: number } = {},
  ): Promise<MappingHistoryEntry[]> {
    const rows = await this.databaseService.db.executeRead((trx) => {
      let query = trx
        .selectFrom('mappingHistory')
        .selectAll()
        .orderBy('historyId', 'desc');
      if (options.generalConceptId !== undefined) {
        query = query.where('generalConceptId', '=', options.generalConceptId);
      }
      if (options.limit !== undefined) {
        query = query.limit(options.limit);
      }
      return query.execute();
    });
    return rows.map(this.mapToDomainEntry);
  }

  private mapToDomainEntry(
    row: Selectable<MappingHistoryTable>,
  ): MappingHistoryEntry {
    return {
      historyId: row.historyId,
      createdAt: row.createdAt,
      action: toAction(row.actionType),
      generalConceptId: row.generalConceptId,
      omopConceptId: row.omopConceptId,
      vocabularyId: row.vocabularyId,
      conceptCode: row.conceptCode,
      conceptName: row.conceptName,
      comment: row.comment,
    };
  }
}
