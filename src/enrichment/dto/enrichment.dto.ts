import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsBoolean, IsOptional } from 'class-validator';

// ============================================
// REQUEST DTO
// ============================================

export class EnrichMappingsDto {
  @ApiPropertyOptional({
    description:
      'Keep the recommended flag on regenerated derived mappings. ' +
      'Defaults to true once a previous sync has been recorded.',
  })
  @IsOptional()
  @IsBoolean()
  @Transform(({ value }) =>
    value === 'true' ? true : value === 'false' ? false : value,
  )
  preserveRecommended?: boolean;
}

// ============================================
// RESPONSE DTO
// ============================================

export class EnrichmentSummaryDto {
  @ApiProperty({ example: '2024-05-01T10:00:00.000Z' })
  syncedAt!: string;

  @ApiProperty({ example: true })
  preserveRecommended!: boolean;

  @ApiProperty({ description: 'Manual mappings after the sync', example: 120 })
  manualCount!: number;

  @ApiProperty({ description: 'Derived mappings after the sync', example: 940 })
  derivedCount!: number;

  @ApiProperty({ description: 'Derived pairs not present before', example: 12 })
  addedCount!: number;

  @ApiProperty({ description: 'Derived pairs no longer produced', example: 3 })
  removedCount!: number;

  @ApiProperty({ description: 'Duration in milliseconds', example: 850 })
  took!: number;
}

export class EnrichmentStatusDto {
  @ApiProperty({ nullable: true, example: '2024-05-01T10:00:00.000Z' })
  lastSyncedAt!: string | null;

  @ApiProperty({ example: 120 })
  manualCount!: number;

  @ApiProperty({ example: 940 })
  derivedCount!: number;
}
