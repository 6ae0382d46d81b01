import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { toNumber } from '../../common/utils/to-number';
import { VocabularyConceptDto } from './vocabulary-response.dto';

export const DEFAULT_SEARCH_LIMIT = 20;
export const MAX_SEARCH_LIMIT = 100;

// ============================================
// REQUEST DTO
// ============================================

export class ConceptSearchQueryDto {
  @ApiProperty({ description: 'Concept name or exact code', example: 'asthma' })
  @IsString()
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsNotEmpty()
  @MaxLength(255)
  query!: string;

  @ApiPropertyOptional({ example: 'SNOMED' })
  @IsOptional()
  @IsString()
  vocabularyId?: string;

  @ApiPropertyOptional({ example: 'Condition' })
  @IsOptional()
  @IsString()
  domainId?: string;

  @ApiPropertyOptional({
    default: DEFAULT_SEARCH_LIMIT,
    minimum: 1,
    maximum: MAX_SEARCH_LIMIT,
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_SEARCH_LIMIT)
  @Transform(toNumber)
  limit?: number = DEFAULT_SEARCH_LIMIT;
}

// ============================================
// RESPONSE DTO
// ============================================

export class ConceptSearchResultDto {
  @ApiProperty({
    description: 'Jaro-Winkler similarity of the name; 1 for an exact code',
    example: 0.93,
  })
  score!: number;

  @ApiProperty({ type: VocabularyConceptDto })
  concept!: VocabularyConceptDto;
}
