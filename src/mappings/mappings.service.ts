import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { isUniqueViolation } from '../common/utils/unique-violation';
import {
  ConceptMapping,
  HistoryAction,
  MappingHistoryEntry,
  MappingHistoryRepository,
  MappingProvenance,
  MappingRepository,
  VocabularyRepository,
} from '../database/repositories';
import { CreateMappingDto, DEFAULT_HISTORY_LIMIT } from './dto';

@Injectable()
export class MappingsService {
  private readonly logger = new Logger(MappingsService.name);

  constructor(
    private readonly mappingRepo: MappingRepository,
    private readonly historyRepo: MappingHistoryRepository,
    private readonly vocabularyRepo: VocabularyRepository,
  ) {}

  async list(generalConceptId?: number): Promise<ConceptMapping[]> {
    if (generalConceptId !== undefined) {
      return this.mappingRepo.findByGeneralConcept(generalConceptId);
    }
    return this.mappingRepo.loadMappings();
  }

  async findOne(mappingId: number): Promise<ConceptMapping> {
    const mapping = await this.mappingRepo.findById(mappingId);
    if (!mapping) throw new NotFoundException(`Mapping ${mappingId} not found`);
    return mapping;
  }

  async createManual(dto: CreateMappingDto): Promise<ConceptMapping> {
    const conflict = () =>
      new ConflictException(
        `Concept ${dto.generalConceptId} is already mapped to ${dto.omopConceptId}`,
      );

    const existing = await this.mappingRepo.findByPair(
      dto.generalConceptId,
      dto.omopConceptId,
    );
    if (existing) throw conflict();

    let created: ConceptMapping;
    try {
      created = await this.mappingRepo.create({
        generalConceptId: dto.generalConceptId,
        omopConceptId: dto.omopConceptId,
        unitConceptId: dto.unitConceptId ?? null,
        recommended: dto.recommended ?? false,
        provenance: MappingProvenance.MANUAL,
      });
    } catch (error) {
      // Lost a race with a concurrent insert of the same pair
      if (isUniqueViolation(error)) throw conflict();
      throw error;
    }

    await this.recordChange(HistoryAction.INSERT, created, dto.comment);
    this.logger.log(
      `Created mapping ${created.mappingId}: ${created.generalConceptId} -> ${created.omopConceptId}`,
    );
    return created;
  }

  async setRecommended(
    mappingId: number,
    recommended: boolean,
    comment?: string,
  ): Promise<ConceptMapping> {
    const mapping = await this.findOne(mappingId);
    await this.mappingRepo.updateRecommended(mappingId, recommended);
    await this.recordChange(
      recommended ? HistoryAction.RECOMMEND : HistoryAction.UNRECOMMEND,
      mapping,
      comment,
    );
    return { ...mapping, recommended };
  }

  async remove(mappingId: number): Promise<void> {
    const mapping = await this.findOne(mappingId);
    // Derived rows are regenerated by the next sync
    if (mapping.provenance === MappingProvenance.DERIVED) {
      throw new BadRequestException(
        `Mapping ${mappingId} is derived from vocabulary relationships and cannot be deleted`,
      );
    }
    await this.mappingRepo.delete(mappingId);
    await this.recordChange(HistoryAction.DELETE, mapping);
  }

  async getHistory(
    generalConceptId?: number,
    limit = DEFAULT_HISTORY_LIMIT,
  ): Promise<MappingHistoryEntry[]> {
    return this.historyRepo.list({ generalConceptId, limit });
  }

  // --- HELPERS ---

  private async recordChange(
    action: HistoryAction,
    mapping: ConceptMapping,
    comment?: string,
  ): Promise<void> {
    const concept = await this.vocabularyRepo.findConcept(mapping.omopConceptId);
    await this.historyRepo.record({
      createdAt: new Date().toISOString(),
      action,
      generalConceptId: mapping.generalConceptId,
      omopConceptId: mapping.omopConceptId,
      vocabularyId: concept?.vocabularyId ?? null,
      conceptCode: concept?.code ?? null,
      conceptName: concept?.name ?? null,
      comment: comment ?? null,
    });
  }
}
