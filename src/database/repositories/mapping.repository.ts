import { Injectable } from '@nestjs/common';
import { Insertable, Kysely, Selectable } from 'kysely';
import { chunk } from '../../common/utils/chunk';
import { DatabaseService } from '../../db/database.service';
import { ConceptMappingTable, DB } from '../../db/types';
import { ConceptMapping, MappingProvenance } from './domain.types';

type NewMappingRow = Insertable<ConceptMappingTable>;

// 6 params per row
const INSERT_BATCH_SIZE = 500;

function toProvenance(source: string): MappingProvenance {
  return source === MappingProvenance.DERIVED
    ? MappingProvenance.DERIVED
    : MappingProvenance.MANUAL;
}

@Injectable()
export class MappingRepository {
  constructor(private readonly databaseService: DatabaseService) {}

  // ============================================
  // FULL COLLECTION (enrichment load / save)
  // ============================================

  /**
   * All mappings in id order. `fromMaster` skips the replicas when the rows
   * feed a write that must not work from a lagging copy.
   */
  async loadMappings(
    options: { fromMaster?: boolean } = {},
  ): Promise<ConceptMapping[]> {
    const query = (db: Kysely<DB>) =>
      db.selectFrom('conceptMapping').selectAll().orderBy('mappingId').execute();

    const rows = options.fromMaster
      ? await query(this.databaseService.db.write())
      : await this.databaseService.db.executeRead(query);
    return rows.map(this.mapToDomainMapping);
  }

  /**
   * Replaces the derived rows in one transaction on master. Manual rows are
   * never touched; a derived row whose pair is held by a manual row at commit
   * time is dropped. Returns the derived rows actually stored.
   */
  async replaceDerivedMappings(
    derived: ConceptMapping[],
  ): Promise<ConceptMapping[]> {
    return this.databaseService.db
      .write()
      .transaction()
      .execute(async (trx) => {
        const manualRows = await trx
          .selectFrom('conceptMapping')
          .select(['generalConceptId', 'omopConceptId'])
          .where('source', '!=', MappingProvenance.DERIVED)
          .execute();
        const taken = new Set(
          manualRows.map((row) => `${row.generalConceptId}:${row.omopConceptId}`),
        );

        await trx
          .deleteFrom('conceptMapping')
          .where('source', '=', MappingProvenance.DERIVED)
          .execute();

        const stored = derived
          .filter((m) => !taken.has(`${m.generalConceptId}:${m.omopConceptId}`))
          .map(
            (m): ConceptMapping => ({
              generalConceptId: m.generalConceptId,
              omopConceptId: m.omopConceptId,
              unitConceptId: m.unitConceptId,
              recommended: m.recommended,
              provenance: MappingProvenance.DERIVED,
            }),
          );
        await this.insertRows(trx, stored.map(this.mapToRow));
        return stored;
      });
  }

  // ============================================
  // SINGLE ROWS
  // ============================================

  async findById(mappingId: number): Promise<ConceptMapping | null> {
    const row = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('conceptMapping')
        .selectAll()
        .where('mappingId', '=', mappingId)
        .executeTakeFirst(),
    );
    return row ? this.mapToDomainMapping(row) : null;
  }

  async findByPair(
    generalConceptId: number,
    omopConceptId: number,
  ): Promise<ConceptMapping | null> {
    // Master: the answer decides whether an insert may proceed
    const row = await this.databaseService.db
      .write()
      .selectFrom('conceptMapping')
      .selectAll()
      .where('generalConceptId', '=', generalConceptId)
      .where('omopConceptId', '=', omopConceptId)
      .executeTakeFirst();
    return row ? this.mapToDomainMapping(row) : null;
  }

  async findByGeneralConcept(
    generalConceptId: number,
  ): Promise<ConceptMapping[]> {
    const rows = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('conceptMapping')
        .selectAll()
        .where('generalConceptId', '=', generalConceptId)
        .orderBy('mappingId')
        .execute(),
    );
    return rows.map(this.mapToDomainMapping);
  }

  async create(mapping: ConceptMapping): Promise<ConceptMapping> {
    const result = await this.databaseService.db
      .write()
      .insertInto('conceptMapping')
      .values(this.mapToRow(mapping))
      .executeTakeFirst();

    return { ...mapping, mappingId: Number(result.insertId) };
  }

  async updateRecommended(
    mappingId: number,
    recommended: boolean,
  ): Promise<void> {
    await this.databaseService.db
      .write()
      .updateTable('conceptMapping')
      .set({ recommended: recommended ? 1 : 0 })
      .where('mappingId', '=', mappingId)
      .execute();
  }

  async delete(mappingId: number): Promise<void> {
    await this.databaseService.db
      .write()
      .deleteFrom('conceptMapping')
      .where('mappingId', '=', mappingId)
      .execute();
  }

  async countByProvenance(): Promise<Record<MappingProvenance, number>> {
    const rows = await this.databaseService.db.executeRead((trx) =>
      trx
        .selectFrom('conceptMapping')
        .select(['source', (eb) => eb.fn.countAll().as('count')])
        .groupBy('source')
        .execute(),
    );

    const counts: Record<MappingProvenance, number> = {
      [MappingProvenance.MANUAL]: 0,
      [MappingProvenance.DERIVED]: 0,
    };
    for (const row of rows) {
      counts[toProvenance(row.source)] += Number(row.count);
    }
    return counts;
  }

  // --- HELPERS ---

  private async insertRows(trx: Kysely<DB>, rows: NewMappingRow[]) {
    for (const batch of chunk(rows, INSERT_BATCH_SIZE)) {
      await trx.insertInto('conceptMapping').values(batch).execute();
    }
  }

  private mapToRow(mapping: ConceptMapping): NewMappingRow {
    const row: NewMappingRow = {
      generalConceptId: mapping.generalConceptId,
      omopConceptId: mapping.omopConceptId,
      omopUnitConceptId: mapping.unitConceptId,
      recommended: mapping.recommended ? 1 : 0,
      source: mapping.provenance,
    };
    if (mapping.mappingId !== undefined) {
      row.mappingId = mapping.mappingId;
    }
    return row;
  }

  private mapToDomainMapping(
    row: Selectable<ConceptMappingTable>,
  ): ConceptMapping {
    return {
      mappingId: row.mappingId,
      generalConceptId: row.generalConceptId,
      omopConceptId: row.omopConceptId,
      unitConceptId: row.omopUnitConceptId,
      recommended: Boolean(row.recommended),
      provenance: toProvenance(row.source),
    };
  }
}
