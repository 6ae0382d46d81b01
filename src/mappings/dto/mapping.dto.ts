import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  MinLength,
} from 'class-validator';
import { toNumber } from '../../common/utils/to-number';
import { HistoryAction, MappingProvenance } from '../../database/repositories';

export const DEFAULT_HISTORY_LIMIT = 100;
export const MAX_HISTORY_LIMIT = 1000;

// ============================================
// REQUEST DTO
// ============================================

export class CreateMappingDto {
  @ApiProperty({ description: 'Local dictionary concept', example: 1042 })
  @IsInt()
  generalConceptId!: number;

  @ApiProperty({ description: 'Vocabulary concept it maps to', example: 320128 })
  @IsInt()
  omopConceptId!: number;

  @ApiPropertyOptional({ nullable: true, example: 8876 })
  @IsOptional()
  @IsInt()
  unitConceptId?: number | null;

  @ApiPropertyOptional({ default: false })
  @IsOptional()
  @IsBoolean()
  recommended?: boolean;

  @ApiPropertyOptional({
    description: 'Free-text note stored in the change history',
    maxLength: 255,
  })
  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  comment?: string;
}

export class SetRecommendedDto {
  @ApiProperty()
  @IsBoolean()
  recommended!: boolean;

  @ApiPropertyOptional({ maxLength: 255 })
  @IsOptional()
  @IsString()
  @MinLength(1)
  @MaxLength(255)
  comment?: string;
}

export class MappingQueryDto {
  @ApiPropertyOptional({ example: 1042 })
  @IsOptional()
  @IsInt()
  @Transform(toNumber)
  generalConceptId?: number;
}

export class MappingHistoryQueryDto {
  @ApiPropertyOptional({ example: 1042 })
  @IsOptional()
  @IsInt()
  @Transform(toNumber)
  generalConceptId?: number;

  @ApiPropertyOptional({
    default: DEFAULT_HISTORY_LIMIT,
    minimum: 1,
    maximum: MAX_HISTORY_LIMIT,
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_HISTORY_LIMIT)
  @Transform(toNumber)
  limit?: number = DEFAULT_HISTORY_LIMIT;
}

// ============================================
// RESPONSE DTO
// ============================================

export class MappingResponseDto {
  @ApiPropertyOptional({ example: 17 })
  mappingId?: number;

  @ApiProperty({ example: 1042 })
  generalConceptId!: number;

  @ApiProperty({ example: 320128 })
  omopConceptId!: number;

  @ApiProperty({ nullable: true, example: null })
  unitConceptId!: number | null;

  @ApiProperty()
  recommended!: boolean;

  @ApiProperty({ enum: MappingProvenance })
  provenance!: MappingProvenance;
}

export class MappingHistoryEntryDto {
  @ApiPropertyOptional({ example: 3 })
  historyId?: number;

  @ApiProperty({ example: '2024-05-01T09:30:00.000Z' })
  createdAt!: string;

  @ApiProperty({ enum: HistoryAction })
  action!: HistoryAction;

  @ApiProperty({ example: 1042 })
  generalConceptId!: number;

  @ApiProperty({ example: 320128 })
  omopConceptId!: number;

  @ApiProperty({ nullable: true, example: 'SNOMED' })
  vocabularyId!: string | null;

  @ApiProperty({ nullable: true, example: '59621000' })
  conceptCode!: string | null;

  @ApiProperty({ nullable: true, example: 'Essential hypertension' })
  conceptName!: string | null;

  @ApiProperty({ nullable: true, example: null })
  comment!: string | null;
}
