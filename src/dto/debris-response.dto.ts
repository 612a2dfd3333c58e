import { ApiProperty } from '@nestjs/swagger';
import { OrbitType, RiskLevel } from '../utils/orbital-derivations';

/** Represents a single enriched catalog object */
export class EnrichedObject {
  @ApiProperty({ example: 25544, nullable: true, description: 'NORAD catalog ID' })
  id!: unknown;

  @ApiProperty({ example: 'ISS (ZARYA)' })
  name!: unknown;

  @ApiProperty({ example: 'ISS' })
  country!: unknown;

  @ApiProperty({ example: 415, description: 'Estimated altitude (km)' })
  altitude!: number;

  @ApiProperty({
    example: 1.55,
    description: 'Simplified speed proxy: mean motion x 0.1',
  })
  velocity!: number;

  @ApiProperty({ enum: ['LOW', 'MEDIUM', 'HIGH'], example: 'HIGH' })
  risk_level!: RiskLevel;

  @ApiProperty({
    enum: ['LEO', 'MEO', 'GEO'],
    example: 'LEO',
    description: 'GEO covers every orbit at or below 1 rev/day',
  })
  orbit_type!: OrbitType;

  @ApiProperty({ example: 'LARGE' })
  size!: unknown;

  @ApiProperty({ example: '1998-11-20' })
  launch_date!: unknown;

  @ApiProperty({ example: '2026-10-18T12:00:00.000000', nullable: true })
  epoch!: unknown;
}

/** The final response object from /api/debris */
export class DebrisResponse {
  @ApiProperty({ example: 1, description: 'Number of objects enriched' })
  total_count!: number;

  @ApiProperty({ type: [EnrichedObject] })
  objects!: EnrichedObject[];

  @ApiProperty({ example: '14:03:27', description: 'Local server time (HH:MM:SS)' })
  last_updated!: string;

  @ApiProperty({ example: 'Space-Track.org (Official US Space Force)' })
  data_source!: string;
}

export class ErrorResponse {
  @ApiProperty({ example: 'Failed to fetch real space data' })
  error!: string;
}

export class HealthResponse {
  @ApiProperty({ example: 'healthy' })
  status!: string;

  @ApiProperty({ example: 'Backend active at 14:03:27' })
  message!: string;

  @ApiProperty({ example: '14:03:27' })
  timestamp!: string;
}
