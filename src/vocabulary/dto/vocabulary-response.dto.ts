import { ApiProperty } from '@nestjs/swagger';
import { StandardFlag } from '../../database/repositories';

export enum HierarchyRelation {
  ANCESTOR = 'Ancestor',
  DESCENDANT = 'Descendant',
}

export class VocabularyConceptDto {
  @ApiProperty({ example: 320128 })
  conceptId!: number;

  @ApiProperty({ example: 'Essential hypertension' })
  name!: string;

  @ApiProperty({ example: 'Condition' })
  domainId!: string;

  @ApiProperty({ example: 'SNOMED' })
  vocabularyId!: string;

  @ApiProperty({ example: 'Clinical Finding' })
  conceptClassId!: string;

  @ApiProperty({ example: '59621000' })
  code!: string;

  @ApiProperty({ enum: StandardFlag })
  standardFlag!: StandardFlag;

  @ApiProperty({ nullable: true, example: null })
  invalidReason!: string | null;
}

export class RelatedConceptDto {
  @ApiProperty({ example: 'Maps to' })
  relationshipId!: string;

  @ApiProperty({ type: VocabularyConceptDto })
  concept!: VocabularyConceptDto;
}

export class HierarchyConceptDto {
  @ApiProperty({ enum: HierarchyRelation })
  relation!: HierarchyRelation;

  @ApiProperty({ type: VocabularyConceptDto })
  concept!: VocabularyConceptDto;
}

export class SynonymDto {
  @ApiProperty({ example: 'High blood pressure' })
  synonym!: string;

  @ApiProperty({ example: 4180186 })
  languageConceptId!: number;

  @ApiProperty({ nullable: true, example: 'English language' })
  language!: string | null;
}

export class VocabularyStatusDto {
  @ApiProperty({ description: 'Whether the concept table has rows' })
  loaded!: boolean;

  @ApiProperty({ example: 5000000 })
  concepts!: number;

  @ApiProperty({ example: 40000000 })
  relationships!: number;

  @ApiProperty({ example: 80000000 })
  ancestors!: number;

  @ApiProperty({ example: 2000000 })
  synonyms!: number;
}
