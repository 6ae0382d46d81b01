import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { HierarchyGraphQueryDto } from '../../hierarchy/dto';
import { MappingHistoryQueryDto, MappingQueryDto } from '../../mappings/dto';
import { ConceptSearchQueryDto } from '../../vocabulary/dto';
import { toNumber } from './to-number';

async function invalidFields<T extends object>(
  cls: new () => T,
  query: Record<string, string>,
): Promise<string[]> {
  const errors = await validate(plainToInstance(cls, query));
  return errors.map((error) => error.property).sort();
}

describe('toNumber', () => {
  it('converts numeric strings and leaves everything else alone', () => {
    expect(toNumber({ value: '42' })).toBe(42);
    expect(toNumber({ value: '1.5' })).toBe(1.5);
    expect(toNumber({ value: '3abc' })).toBeNaN();
    expect(toNumber({ value: ' ' })).toBe(' ');
    expect(toNumber({ value: 7 })).toBe(7);
  });
});

describe('numeric query parameters', () => {
  it('accept integers', async () => {
    const dto = plainToInstance(HierarchyGraphQueryDto, {
      maxLevelsUp: '2',
      previousConceptId: '320128',
    });

    expect(await validate(dto)).toEqual([]);
    expect(dto.maxLevelsUp).toBe(2);
    expect(dto.maxLevelsDown).toBe(5);
    expect(dto.previousConceptId).toBe(320128);
  });

  it('reject fractions and trailing characters', async () => {
    expect(
      await invalidFields(HierarchyGraphQueryDto, {
        maxLevelsUp: '1.5',
        maxLevelsDown: '3abc',
        previousConceptId: '12x',
      }),
    ).toEqual(['maxLevelsDown', 'maxLevelsUp', 'previousConceptId']);
    expect(await invalidFields(MappingQueryDto, { generalConceptId: '1.5' })).toEqual([
      'generalConceptId',
    ]);
    expect(
      await invalidFields(MappingHistoryQueryDto, {
        generalConceptId: '3abc',
        limit: '10.0.1',
      }),
    ).toEqual(['generalConceptId', 'limit']);
    expect(
      await invalidFields(ConceptSearchQueryDto, { query: 'asthma', limit: '2e' }),
    ).toEqual(['limit']);
  });

  it('reject an empty value', async () => {
    expect(await invalidFields(MappingQueryDto, { generalConceptId: '' })).toEqual([
      'generalConceptId',
    ]);
  });
});
