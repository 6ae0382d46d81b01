import { ApiProperty } from '@nestjs/swagger';
import { HierarchyTier } from '../hierarchy.types';

export class HierarchyStatsDto {
  @ApiProperty({ example: 4 })
  ancestorCount!: number;

  @ApiProperty({ example: 37 })
  descendantCount!: number;

  @ApiProperty({ description: 'Ancestors plus descendants', example: 41 })
  totalCount!: number;

  @ApiProperty({ description: 'Direct edges between visited concepts', example: 52 })
  edgeCount!: number;

  @ApiProperty({ example: 5 })
  maxLevelsUp!: number;

  @ApiProperty({ example: 5 })
  maxLevelsDown!: number;
}

export class HierarchySizeDto extends HierarchyStatsDto {
  @ApiProperty({ description: 'Node count above which a warning is due', example: 100 })
  threshold!: number;

  @ApiProperty({ example: false })
  exceedsThreshold!: boolean;
}

export class HierarchyNodeDto {
  @ApiProperty({ example: 320128 })
  id!: number;

  @ApiProperty({ description: 'Display label, cut to 50 characters', example: 'Essential hypertension' })
  label!: string;

  @ApiProperty({ example: 'Essential hypertension' })
  name!: string;

  @ApiProperty({ description: 'Negative above the center, 0 at it, positive below', example: -1 })
  level!: number;

  @ApiProperty({ enum: HierarchyTier })
  tier!: HierarchyTier;

  @ApiProperty()
  isCurrent!: boolean;

  @ApiProperty()
  isPrevious!: boolean;

  @ApiProperty({ example: 'SNOMED' })
  vocabularyId!: string;

  @ApiProperty({ example: '59621000' })
  conceptCode!: string;

  @ApiProperty({ example: 'Clinical Finding' })
  conceptClassId!: string;
}

export class HierarchyEdgeDto {
  @ApiProperty({ description: 'Parent concept ID', example: 316866 })
  source!: number;

  @ApiProperty({ description: 'Child concept ID', example: 320128 })
  target!: number;
}

export class HierarchyGraphDto {
  @ApiProperty({ type: [HierarchyNodeDto] })
  nodes!: HierarchyNodeDto[];

  @ApiProperty({ type: [HierarchyEdgeDto] })
  edges!: HierarchyEdgeDto[];

  @ApiProperty({ type: HierarchyStatsDto })
  stats!: HierarchyStatsDto;
}
