/**
 * Remote Statistics Fetcher
 *
 * Reads Census 2021 tables from the Nomis JSON-stat API. Every failure
 * (HTTP status, timeout, network, empty or non-JSON body) is logged and
 * surfaced as `null`; callers treat it as "no data", never as a fault.
 *
 * Transient failures (408/429/5xx, timeouts, network errors) are retried
 * by the shared HTTPClient with increasing delay.
 */

import { z } from 'zod';
import { HTTPClient, buildUrl } from '../core/http-client.js';
import { DEFAULT_NOMIS_CONFIG, type NomisConfig } from '../core/config.js';
import { errorMessage } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import type { DimensionFilter } from '../core/types.js';

const logger = createLogger({ module: 'nomis' });

/**
 * Parsed response body. Only `value` is read by the pipeline; an `error`
 * member or any other shape means "no data".
 */
export interface RawStatisticalResponse {
  readonly value?: unknown;
  readonly error?: unknown;
  readonly [key: string]: unknown;
}

/**
 * Contract the pipeline requires from a statistics backend
 */
export interface StatisticsSource {
  fetch(
    datasetId: string,
    geographyCode: string,
    filter: DimensionFilter | null
  ): Promise<RawStatisticalResponse | null>;
}

const ResponseObjectSchema = z.record(z.unknown());

/**
 * Return the raw `value` array of a response, or `null` for any other shape
 * (absent response, error payload, object-valued JSON-stat `value`).
 */
export function readValues(response: RawStatisticalResponse | null): readonly unknown[] | null {
  if (response === null) {
    return null;
  }
  const value = response.value;
  return Array.isArray(value) ? value : null;
}

export interface NomisClientOptions {
  readonly config?: Partial<NomisConfig>;
  /** Injected transport; built from config when omitted */
  readonly http?: HTTPClient;
  /** Reuse responses for identical requests within this client (default: true) */
  readonly memoize?: boolean;
}

export class NomisClient implements StatisticsSource {
  private readonly config: NomisConfig;
  private readonly http: HTTPClient;
  private readonly memoize: boolean;
  private readonly cache = new Map<string, Promise<RawStatisticalResponse | null>>();

  constructor(options: NomisClientOptions = {}) {
    this.config = { ...DEFAULT_NOMIS_CONFIG, ...options.config };
    this.http =
      options.http ??
      new HTTPClient({
        maxRetries: this.config.maxRetries,
        initialDelayMs: this.config.initialDelayMs,
        backoffMultiplier: this.config.backoffMultiplier,
        timeoutMs: this.config.timeoutMs,
      });
    this.memoize = options.memoize ?? true;
  }

  /**
   * Dataset query URL: latest release, count and percentage measures
   */
  buildRequestUrl(
    datasetId: string,
    geographyCode: string,
    filter: DimensionFilter | null
  ): string {
    return buildUrl(
      `${this.config.baseUrl}/dataset/${encodeURIComponent(datasetId)}.jsonstat.json`,
      {
        geography: geographyCode,
        date: 'latest',
        measures: this.config.measures,
        ...(filter ?? {}),
      }
    );
  }

  fetch(
    datasetId: string,
    geographyCode: string,
    filter: DimensionFilter | null
  ): Promise<RawStatisticalResponse | null> {
    const url = this.buildRequestUrl(datasetId, geographyCode, filter);

    if (!this.memoize) {
      return this.request(url, datasetId, geographyCode);
    }

    const cached = this.cache.get(url);
    if (cached) {
      return cached;
    }
    const pending = this.request(url, datasetId, geographyCode);
    this.cache.set(url, pending);
    return pending;
  }

  private async request(
    url: string,
    datasetId: string,
    geographyCode: string
  ): Promise<RawStatisticalResponse | null> {
    try {
      const body = await this.http.fetchJSON(url);
      const parsed = ResponseObjectSchema.safeParse(body);

      if (!parsed.success) {
        logger.warn('Statistics response is not an object', { datasetId, geographyCode, url });
        return null;
      }
      if ('error' in parsed.data) {
        logger.warn('Statistics service returned an error payload', {
          datasetId,
          geographyCode,
          error: parsed.data.error,
        });
      }
      return parsed.data;
    } catch (error) {
      logger.error('Statistics fetch failed', {
        datasetId,
        geographyCode,
        url,
        error: errorMessage(error),
      });
      return null;
    }
  }
}

export function createNomisClient(options?: NomisClientOptions): NomisClient {
  return new NomisClient(options);
}
