import { readFile } from 'node:fs/promises';
import ee from '@google/earthengine';
import { fetch } from 'undici';
import { z } from 'zod';
import type { ImageryConfig } from '../config/serviceConfig';
import { errorMessage, ExternalServiceError } from '../errors';
import { createSilentLogger, type Logger } from '../observability/logger';
import { monthToDate, nextMonth } from '../utils/months';
import type { ImageryProvider, MonthlyCompositeRequest } from './provider';

const serviceAccountKeySchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1)
});

export type EarthEngineProviderOptions = {
  config: ImageryConfig;
  api?: ee.Api;
  download?: (url: string, signal?: AbortSignal) => Promise<Buffer>;
  loadCredentials?: (path: string) => Promise<string>;
  logger?: Logger;
};

async function downloadWithUndici(url: string, signal?: AbortSignal): Promise<Buffer> {
  const response = await fetch(url, { signal });
  if (!response.ok) {
    throw new Error(`download failed with status ${response.status}`);
  }
  return Buffer.from(await response.arrayBuffer());
}

function evaluate(value: ee.ComputedObject): Promise<unknown> {
  return new Promise((resolve, reject) => {
    value.evaluate((result, error) => {
      if (error) {
        reject(new Error(error));
        return;
      }
      resolve(result);
    });
  });
}

function downloadUrl(image: ee.Image, params: ee.DownloadParams): Promise<string> {
  return new Promise((resolve, reject) => {
    image.getDownloadURL(params, (url, error) => {
      if (error || !url) {
        reject(new Error(error ?? 'no download url returned'));
        return;
      }
      resolve(url);
    });
  });
}

/**
 * Monthly mean composites from an Earth Engine image collection.
 * Authentication runs once; a failed attempt is retried on the next request.
 */
export class EarthEngineProvider implements ImageryProvider {
  readonly source: string;
  private readonly config: ImageryConfig;
  private readonly api: ee.Api;
  private readonly download: (url: string, signal?: AbortSignal) => Promise<Buffer>;
  private readonly loadCredentials: (path: string) => Promise<string>;
  private readonly logger: Logger;
  private initialization: Promise<void> | null = null;

  constructor(options: EarthEngineProviderOptions) {
    this.config = options.config;
    this.source = options.config.source;
    this.api = options.api ?? ee;
    this.download = options.download ?? downloadWithUndici;
    this.loadCredentials = options.loadCredentials ?? ((path) => readFile(path, 'utf8'));
    this.logger = options.logger ?? createSilentLogger();
  }

  async fetchMonthlyComposite(request: MonthlyCompositeRequest): Promise<Buffer> {
    await this.initialize();

    const label = `${request.year}-${request.month.toString().padStart(2, '0')}`;
    const start = monthToDate(request);
    const end = monthToDate(nextMonth(request));

    try {
      const region = this.api.Geometry(request.geometry);
      const collection = this.api.ImageCollection(this.config.collection).filterDate(start, end);
      const size = await evaluate(collection.size());
      if (typeof size !== 'number' || size === 0) {
        throw new ExternalServiceError(`no ${this.config.collection} images for ${label}`, 'IMAGERY', {
          month: label
        });
      }

      const composite = collection.mean().select([this.config.band]).clip(region);
      const url = await downloadUrl(composite, {
        region,
        scale: this.config.scaleMeters,
        format: 'GEO_TIFF',
        crs: 'EPSG:4326'
      });
      request.signal?.throwIfAborted();
      const bytes = await this.download(url, request.signal);
      this.logger.debug({ month: label, bytes: bytes.length }, 'downloaded monthly composite');
      return bytes;
    } catch (err) {
      if (err instanceof ExternalServiceError) {
        throw err;
      }
      throw new ExternalServiceError(
        `imagery export for ${label} failed: ${errorMessage(err)}`,
        'IMAGERY',
        { month: label },
        { cause: err }
      );
    }
  }

  private initialize(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.authenticate().catch((err: unknown) => {
        this.initialization = null;
        throw err;
      });
    }
    return this.initialization;
  }

  private async authenticate(): Promise<void> {
    const credentialsPath = this.config.credentialsPath;
    if (!credentialsPath) {
      throw new ExternalServiceError('imagery credentials are not configured (GOOGLE_APPLICATION_CREDENTIALS)', 'IMAGERY');
    }

    let key: ee.ServiceAccountKey;
    try {
      const raw = await this.loadCredentials(credentialsPath);
      key = serviceAccountKeySchema.parse(JSON.parse(raw));
    } catch (err) {
      throw new ExternalServiceError(
        `unable to read imagery credentials from ${credentialsPath}: ${errorMessage(err)}`,
        'IMAGERY',
        undefined,
        { cause: err }
      );
    }

    await new Promise<void>((resolve, reject) => {
      this.api.data.authenticateViaPrivateKey(key, resolve, (error) =>
        reject(new ExternalServiceError(`imagery authentication failed: ${error}`, 'IMAGERY'))
      );
    });
    await new Promise<void>((resolve, reject) => {
      this.api.initialize(null, null, resolve, (error) =>
        reject(new ExternalServiceError(`imagery initialization failed: ${error}`, 'IMAGERY'))
      );
    });
    this.logger.info({ collection: this.config.collection }, 'imagery provider initialized');
  }
}
