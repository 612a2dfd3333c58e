import { HttpException, HttpStatus } from '@nestjs/common';

export type UpstreamErrorCode = 'UPSTREAM_AUTH_FAILURE' | 'UPSTREAM_FETCH_FAILURE';

/**
 * Whole-request failure talking to Space-Track.
 * Rendered by Nest as a 500 with body { error }.
 */
export abstract class UpstreamError extends HttpException {
  abstract readonly code: UpstreamErrorCode;

  constructor(message: string) {
    super({ error: message }, HttpStatus.INTERNAL_SERVER_ERROR);
  }
}

/** Login rejected or provider unreachable */
export class UpstreamAuthError extends UpstreamError {
  readonly code = 'UPSTREAM_AUTH_FAILURE';

  constructor() {
    super('Failed to authenticate with Space-Track.org');
  }
}

/** Authenticated, but the GP query failed */
export class UpstreamFetchError extends UpstreamError {
  readonly code = 'UPSTREAM_FETCH_FAILURE';

  constructor() {
    super('Failed to fetch real space data');
  }
}
