import { registerAs } from '@nestjs/config';

const DEFAULT_LIMIT = 10000;

function parseLimit(raw: string | undefined): number {
  const parsed = raw === undefined ? NaN : parseInt(raw, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_LIMIT;
}

/**
 * Space-Track credentials are read as-is; a missing value only shows up
 * as a failed login on the first request.
 */
export default registerAs('spaceTrack', () => ({
  username: process.env.SPACE_TRACK_USERNAME,
  password: process.env.SPACE_TRACK_PASSWORD,
  baseUrl: process.env.SPACE_TRACK_BASE_URL || 'https://www.space-track.org',
  defaultLimit: parseLimit(process.env.SPACE_TRACK_DEFAULT_LIMIT),
}));
