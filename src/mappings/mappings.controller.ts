import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
  ValidationPipe,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
  CreateMappingDto,
  MappingHistoryEntryDto,
  MappingHistoryQueryDto,
  MappingQueryDto,
  MappingResponseDto,
  SetRecommendedDto,
} from './dto';
import { MappingsService } from './mappings.service';

@ApiTags('mappings')
@Controller('api/mappings')
export class MappingsController {
  constructor(private readonly mappingsService: MappingsService) {}

  @Get()
  @ApiOperation({ summary: 'List mappings, optionally for one general concept' })
  @ApiResponse({ status: 200, type: [MappingResponseDto] })
  async list(
    @Query(new ValidationPipe({ transform: true })) query: MappingQueryDto,
  ): Promise<MappingResponseDto[]> {
    return this.mappingsService.list(query.generalConceptId);
  }

  @Get('history')
  @ApiOperation({ summary: 'Mapping changes, newest first' })
  @ApiResponse({ status: 200, type: [MappingHistoryEntryDto] })
  async getHistory(
    @Query(new ValidationPipe({ transform: true }))
    query: MappingHistoryQueryDto,
  ): Promise<MappingHistoryEntryDto[]> {
    return this.mappingsService.getHistory(query.generalConceptId, query.limit);
  }

  @Post()
  @ApiOperation({ summary: 'Create a manual mapping' })
  @ApiResponse({ status: 201, type: MappingResponseDto })
  @ApiResponse({ status: 409, description: 'Pair already mapped' })
  async create(
    @Body(new ValidationPipe({ transform: true })) dto: CreateMappingDto,
  ): Promise<MappingResponseDto> {
    return this.mappingsService.createManual(dto);
  }

  @Patch(':mappingId/recommended')
  @ApiOperation({ summary: 'Set or clear the recommended flag' })
  @ApiResponse({ status: 200, type: MappingResponseDto })
  @ApiResponse({ status: 404, description: 'Mapping not found' })
  async setRecommended(
    @Param('mappingId', ParseIntPipe) mappingId: number,
    @Body(new ValidationPipe({ transform: true })) dto: SetRecommendedDto,
  ): Promise<MappingResponseDto> {
    return this.mappingsService.setRecommended(
      mappingId,
      dto.recommended,
      dto.comment,
    );
  }

  @Delete(':mappingId')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a manual mapping' })
  @ApiResponse({ status: 204, description: 'Deleted' })
  @ApiResponse({ status: 400, description: 'Derived mappings cannot be deleted' })
  async remove(@Param('mappingId', ParseIntPipe) mappingId: number) {
    await this.mappingsService.remove(mappingId);
  }
}
