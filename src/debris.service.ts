import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';

import spaceTrackConfig from './config/space-track.config';
import { DebrisResponse } from './dto/debris-response.dto';
import { EnrichmentService } from './enrichment.service';
import { SpaceTrackSession } from './space-track.session';

export const DATA_SOURCE = 'Space-Track.org (Official US Space Force)';

/** Local wall-clock time as HH:MM:SS */
export function clockTime(date: Date = new Date()): string {
  return date.toTimeString().slice(0, 8);
}

@Injectable()
export class DebrisService {
  private readonly logger = new Logger(DebrisService.name);

  constructor(
    private readonly session: SpaceTrackSession,
    private readonly enrichment: EnrichmentService,
    @Inject(spaceTrackConfig.KEY)
    private readonly config: ConfigType<typeof spaceTrackConfig>,
  ) {}

  /**
   * Debris logic:
   *  - Fetches raw GP records through the (lazily authenticated) session
   *  - Enriches each record, skipping the malformed ones
   *  - Wraps the result in the envelope the frontend expects
   * Upstream failures propagate as UpstreamError (500, { error }).
   */
  async getDebris(limit: number = this.config.defaultLimit): Promise<DebrisResponse> {
    this.logger.log(`Fetching space debris data (limit ${limit})`);

    const records = await this.session.fetchRecords(limit);
    const objects = this.enrichment.enrich(records);

    this.logger.log(`Successfully processed ${objects.length} space objects`);

    return {
      total_count: objects.length,
      objects,
      last_updated: clockTime(),
      data_source: DATA_SOURCE,
    };
  }
}
