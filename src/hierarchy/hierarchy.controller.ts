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
  HierarchyGraphDto,
  HierarchyGraphQueryDto,
  HierarchyQueryDto,
  HierarchySizeDto,
} from './dto';
import { HierarchyService } from './hierarchy.service';

@ApiTags('hierarchy')
@Controller('api/hierarchy')
export class HierarchyController {
  constructor(private readonly hierarchyService: HierarchyService) {}

  @Get(':conceptId/count')
  @ApiOperation({
    summary: 'Count the hierarchy around a concept',
    description: `
      Runs the same bounded traversal as the graph endpoint but returns only
      counts. Call it first: when exceedsThreshold is true the client should
      warn before requesting the graph.
    `,
  })
  @ApiParam({ name: 'conceptId', example: 320128 })
  @ApiResponse({ status: 200, type: HierarchySizeDto })
  async count(
    @Param('conceptId', ParseIntPipe) conceptId: number,
    @Query(new ValidationPipe({ transform: true })) query: HierarchyQueryDto,
  ): Promise<HierarchySizeDto> {
    return this.hierarchyService.checkSize(
      conceptId,
      query.maxLevelsUp,
      query.maxLevelsDown,
    );
  }

  @Get(':conceptId/graph')
  @ApiOperation({
    summary: 'Hierarchy graph around a concept',
    description: `
      Ancestors (negative levels), the selected concept (level 0) and
      descendants (positive levels) with the direct parent -> child edges
      between them. An unknown concept yields an empty graph.
    `,
  })
  @ApiParam({ name: 'conceptId', example: 320128 })
  @ApiResponse({ status: 200, type: HierarchyGraphDto })
  async graph(
    @Param('conceptId', ParseIntPipe) conceptId: number,
    @Query(new ValidationPipe({ transform: true }))
    query: HierarchyGraphQueryDto,
  ): Promise<HierarchyGraphDto> {
    return this.hierarchyService.buildHierarchyGraph(
      conceptId,
      query.maxLevelsUp,
      query.maxLevelsDown,
      query.previousConceptId,
    );
  }
}
