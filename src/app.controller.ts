import { Controller, Get, Query } from '@nestjs/common';
import {
  ApiInternalServerErrorResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';

import { DebrisService, clockTime } from './debris.service';
import { DebrisQueryDto } from './dto/debris-query.dto';
import {
  DebrisResponse,
  ErrorResponse,
  HealthResponse,
} from './dto/debris-response.dto';

@ApiTags('debris')
@Controller()
export class AppController {
  constructor(private readonly debrisService: DebrisService) {}

  @Get('health')
  @ApiOperation({ summary: 'Liveness check' })
  @ApiOkResponse({ type: HealthResponse })
  health(): HealthResponse {
    const now = clockTime();
    return {
      status: 'healthy',
      message: `Backend active at ${now}`,
      timestamp: now,
    };
  }

  @Get('api/debris')
  @ApiOperation({
    summary:
      'Returns recent low-orbit catalog objects from Space-Track, enriched with altitude, risk level and orbit type',
  })
  @ApiOkResponse({ type: DebrisResponse })
  @ApiInternalServerErrorResponse({ type: ErrorResponse })
  async debris(@Query() query: DebrisQueryDto): Promise<DebrisResponse> {
    return this.debrisService.getDebris(query.limit);
  }
}
