import {
  Body,
  Controller,
  Get,
  HttpCode,
  Post,
  ValidationPipe,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
  EnrichMappingsDto,
  EnrichmentStatusDto,
  EnrichmentSummaryDto,
} from './dto';
import { EnrichmentService } from './enrichment.service';

@ApiTags('mappings')
@Controller('api/mappings/enrich')
export class EnrichmentController {
  constructor(private readonly enrichmentService: EnrichmentService) {}

  @Post()
  @HttpCode(200)
  @ApiOperation({
    summary: 'Regenerate derived mappings',
    description: `
      Drops every mapping derived from OHDSI relationships and rebuilds them
      from the recommended manual mappings ("Maps to" / "Mapped from" targets
      and hierarchy descendants in the same vocabulary).
    `,
  })
  @ApiResponse({ status: 200, type: EnrichmentSummaryDto })
  @ApiResponse({ status: 503, description: 'Vocabulary not loaded' })
  async enrich(
    @Body(new ValidationPipe({ transform: true })) body: EnrichMappingsDto,
  ): Promise<EnrichmentSummaryDto> {
    return this.enrichmentService.sync(body.preserveRecommended);
  }

  @Get('status')
  @ApiOperation({ summary: 'Last sync time and mapping counts' })
  @ApiResponse({ status: 200, type: EnrichmentStatusDto })
  async getStatus(): Promise<EnrichmentStatusDto> {
    return this.enrichmentService.getStatus();
  }
}
