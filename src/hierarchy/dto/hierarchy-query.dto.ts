import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';
import { toNumber } from '../../common/utils/to-number';

export const DEFAULT_MAX_LEVELS = 5;
export const MAX_LEVELS_LIMIT = 10;

// ============================================
// REQUEST DTO
// ============================================

export class HierarchyQueryDto {
  @ApiPropertyOptional({
    description: 'Levels to walk upward (ancestors)',
    default: DEFAULT_MAX_LEVELS,
    minimum: 0,
    maximum: MAX_LEVELS_LIMIT,
  })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_LEVELS_LIMIT)
  @Transform(toNumber)
  maxLevelsUp?: number = DEFAULT_MAX_LEVELS;

  @ApiPropertyOptional({
    description: 'Levels to walk downward (descendants)',
    default: DEFAULT_MAX_LEVELS,
    minimum: 0,
    maximum: MAX_LEVELS_LIMIT,
  })
  @IsOptional()
  @IsInt()
  @Min(0)
  @Max(MAX_LEVELS_LIMIT)
  @Transform(toNumber)
  maxLevelsDown?: number = DEFAULT_MAX_LEVELS;
}

export class HierarchyGraphQueryDto extends HierarchyQueryDto {
  @ApiPropertyOptional({
    description: 'Concept the user navigated from; flagged as isPrevious',
    example: 320128,
  })
  @IsOptional()
  @IsInt()
  @Transform(toNumber)
  previousConceptId?: number;
}
