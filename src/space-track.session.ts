import {
  HttpException,
  HttpStatus,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';

import spaceTrackConfig from './config/space-track.config';
import { UpstreamAuthError, UpstreamFetchError } from './errors/upstream.errors';
import { CookieJar, FetchFn, HTTP_FETCH } from './utils/http-client';

/**
 * SpaceTrackSession:
 *   - Logs in to Space-Track.org lazily, on the first fetch.
 *   - Keeps the session cookie for the lifetime of the provider.
 *   - Fetches recent low-orbit GP records (mean motion > 11 rev/day).
 */
@Injectable()
export class SpaceTrackSession {
  private readonly logger = new Logger(SpaceTrackSession.name);
  private readonly cookies = new CookieJar();
  private authenticated = false;
  private pendingLogin: Promise<boolean> | null = null;

  constructor(
    @Inject(spaceTrackConfig.KEY)
    private readonly config: ConfigType<typeof spaceTrackConfig>,
    @Inject(HTTP_FETCH) private readonly fetch: FetchFn,
  ) {}

  get isAuthenticated(): boolean {
    return this.authenticated;
  }

  /**
   * Submits the credentials to /ajaxauth/login.
   * Resolves to false on a non-200 status or transport error; never retries.
   */
  async authenticate(): Promise<boolean> {
    const { username, password, baseUrl } = this.config;
    if (!username || !password) {
      this.logger.warn(
        'Authentication skipped: SPACE_TRACK_USERNAME or SPACE_TRACK_PASSWORD is not set',
      );
      return false;
    }

    try {
      const response = await this.fetch(`${baseUrl}/ajaxauth/login`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({ identity: username, password }).toString(),
      });
      if (response.status !== 200) {
        this.logger.error(`Authentication failed: ${response.status}`);
        return false;
      }
      this.cookies.store(response.headers.get('set-cookie'));
      this.authenticated = true;
      this.logger.log('Successfully authenticated with Space-Track.org');
      return true;
    } catch (err) {
      this.logger.error(`Authentication error: ${errorMessage(err)}`);
      return false;
    }
  }

  /**
   * Resolves immediately once logged in. Concurrent callers share a single
   * in-flight login.
   */
  async ensureAuthenticated(): Promise<boolean> {
    if (this.authenticated) {
      return true;
    }
    if (!this.pendingLogin) {
      this.pendingLogin = this.authenticate().finally(() => {
        this.pendingLogin = null;
      });
    }
    return this.pendingLogin;
  }

  /**
   * Fetches up to `limit` GP records with an epoch in the last 30 days and
   * mean motion > 11 rev/day, ordered by NORAD catalog ID.
   * The list is returned untouched; its entries are not validated here.
   */
  async fetchRecords(limit: number): Promise<unknown[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new HttpException(
        'limit must be a positive integer',
        HttpStatus.BAD_REQUEST,
      );
    }

    if (!(await this.ensureAuthenticated())) {
      throw new UpstreamAuthError();
    }

    const url = this.queryUrl(limit);
    let body: unknown;
    try {
      const cookie = this.cookies.header();
      const response = await this.fetch(url, {
        method: 'GET',
        headers: cookie ? { Cookie: cookie } : {},
      });
      if (response.status === 401) {
        // Session expired; the next request logs in again
        this.authenticated = false;
        this.cookies.clear();
      }
      if (response.status !== 200) {
        this.logger.error(`Data fetch failed: ${response.status}`);
        throw new UpstreamFetchError();
      }
      body = await response.json();
    } catch (err) {
      if (err instanceof UpstreamFetchError) {
        throw err;
      }
      this.logger.error(`Data fetch error: ${errorMessage(err)}`);
      throw new UpstreamFetchError();
    }

    if (!Array.isArray(body)) {
      this.logger.error('Data fetch failed: expected an array of GP records');
      throw new UpstreamFetchError();
    }
    return body;
  }

  queryUrl(limit: number): string {
    return (
      `${this.config.baseUrl}/basicspacedata/query/class/gp` +
      '/EPOCH/>now-30' +
      '/MEAN_MOTION/>11' +
      '/orderby/NORAD_CAT_ID' +
      `/limit/${limit}` +
      '/format/json'
    );
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
