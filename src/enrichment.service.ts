import { Injectable, Logger } from '@nestjs/common';

import { EnrichedObject } from './dto/debris-response.dto';
import { RawFieldValue, RawTrackingRecord } from './dto/space-track-record.dto';
import {
  Derived,
  altitude,
  orbitType,
  riskLevel,
  velocity,
} from './utils/orbital-derivations';

function isRecord(raw: unknown): raw is RawTrackingRecord {
  return raw !== null && typeof raw === 'object' && !Array.isArray(raw);
}

/**
 * Copies a field as-is. The fallback only applies when the key is absent,
 * so an explicit null stays null.
 */
function passthrough(
  record: RawTrackingRecord,
  field: string,
  fallback: RawFieldValue,
): unknown {
  const value = record[field];
  return value === undefined ? fallback : value;
}

/**
 * EnrichmentService:
 *   - Turns raw GP records into the simplified objects the frontend draws.
 *   - A record that cannot be enriched is dropped; the batch never fails.
 */
@Injectable()
export class EnrichmentService {
  private readonly logger = new Logger(EnrichmentService.name);

  enrich(records: readonly unknown[]): EnrichedObject[] {
    const objects: EnrichedObject[] = [];
    for (const record of records) {
      const result = this.enrichRecord(record);
      if (result.ok) {
        objects.push(result.value);
      }
    }

    const dropped = records.length - objects.length;
    if (dropped > 0) {
      this.logger.debug(`Skipped ${dropped} malformed record(s)`);
    }
    return objects;
  }

  enrichRecord(raw: unknown): Derived<EnrichedObject> {
    if (!isRecord(raw)) {
      return { ok: false, reason: 'record is not an object' };
    }

    const speed = velocity(raw);
    if (!speed.ok) return speed;
    const height = altitude(raw);
    if (!height.ok) return height;

    return {
      ok: true,
      value: {
        id: passthrough(raw, 'NORAD_CAT_ID', null),
        name: passthrough(raw, 'OBJECT_NAME', 'Unknown Object'),
        country: passthrough(raw, 'COUNTRY_CODE', 'Unknown'),
        altitude: height.value,
        velocity: speed.value,
        risk_level: riskLevel(raw),
        orbit_type: orbitType(raw),
        size: passthrough(raw, 'RCS_SIZE', 'Unknown'),
        launch_date: passthrough(raw, 'LAUNCH_DATE', 'Unknown'),
        epoch: passthrough(raw, 'EPOCH', null),
      },
    };
  }
}
