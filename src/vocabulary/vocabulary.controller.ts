import {
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Query,
  ValidationPipe,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
  ConceptSearchQueryDto,
  ConceptSearchResultDto,
  HierarchyConceptDto,
  RelatedConceptDto,
  SynonymDto,
  VocabularyConceptDto,
  VocabularyStatusDto,
} from './dto';
import { VocabularyService } from './vocabulary.service';

@ApiTags('vocabulary')
@Controller('api/vocabulary')
export class VocabularyController {
  constructor(private readonly vocabularyService: VocabularyService) {}

  @Get('status')
  @ApiOperation({ summary: 'Whether the vocabulary is loaded, with row counts' })
  @ApiResponse({ status: 200, type: VocabularyStatusDto })
  async getStatus(): Promise<VocabularyStatusDto> {
    return this.vocabularyService.getStatus();
  }

  @Get('concepts')
  @ApiOperation({ summary: 'Fuzzy search by concept name or exact code' })
  @ApiResponse({ status: 200, type: [ConceptSearchResultDto] })
  async search(
    @Query(new ValidationPipe({ transform: true })) dto: ConceptSearchQueryDto,
  ): Promise<ConceptSearchResultDto[]> {
    return this.vocabularyService.searchConcepts(
      dto.query,
      { vocabularyId: dto.vocabularyId, domainId: dto.domainId },
      dto.limit,
    );
  }

  @Get('concepts/:id')
  @ApiOperation({ summary: 'Concept details' })
  @ApiParam({ name: 'id', example: 320128 })
  @ApiResponse({ status: 200, type: VocabularyConceptDto })
  @ApiResponse({ status: 404, description: 'Concept not found' })
  async getConcept(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<VocabularyConceptDto> {
    return this.vocabularyService.getConcept(id);
  }

  @Get('concepts/:id/related')
  @ApiOperation({ summary: 'Outgoing relationships of a concept' })
  @ApiResponse({ status: 200, type: [RelatedConceptDto] })
  async getRelated(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<RelatedConceptDto[]> {
    return this.vocabularyService.getRelatedConcepts(id);
  }

  @Get('concepts/:id/hierarchy-concepts')
  @ApiOperation({
    summary: 'Standard, valid ancestors and descendants from the closure',
  })
  @ApiResponse({ status: 200, type: [HierarchyConceptDto] })
  async getHierarchyConcepts(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<HierarchyConceptDto[]> {
    return this.vocabularyService.getHierarchyConcepts(id);
  }

  @Get('concepts/:id/synonyms')
  @ApiOperation({ summary: 'Synonyms with their language' })
  @ApiResponse({ status: 200, type: [SynonymDto] })
  async getSynonyms(@Param('id', ParseIntPipe) id: number): Promise<SynonymDto[]> {
    return this.vocabularyService.getSynonyms(id);
  }
}
