import { parseNginxStats, selectStream, toKbps } from './nginxStats.js';
import { classifySwitch } from './switchLogic.js';
import { UnsupportedOperationError, type StreamSample, type StreamServer } from './StreamServer.js';
import type { Logger } from '../logger.js';
import type { NginxConfig, NginxRtmpStream, SwitchType, Triggers } from './types.js';

export interface NginxServerOptions {
  logger: Logger;
  requestTimeoutMs?: number;
}

export class NginxServer implements StreamServer {
  readonly type = 'nginx';
  private readonly config: Readonly<NginxConfig>;
  private readonly logger: Logger;
  private readonly requestTimeoutMs: number;

  constructor(config: NginxConfig, options: NginxServerOptions) {
    this.config = Object.freeze({ ...config });
    this.logger = options.logger;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 5000;
  }

  /**
   * Fetch the stat page and pick out the configured stream.
   *
   * A bitrate of 0 means the stream just started; nginx-rtmp refreshes its
   * stats every 10 seconds, so polling faster than that gains nothing.
   */
  async getStats(signal?: AbortSignal): Promise<NginxRtmpStream | null> {
    const { statsUrl, application, key } = this.config;
    const timeout = AbortSignal.timeout(this.requestTimeoutMs);

    let res: Response;
    try {
      res = await fetch(statsUrl, {
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (err) {
      if (signal?.aborted) {
        this.logger.debug(`[Nginx] Stats request to ${statsUrl} aborted`);
        return null;
      }
      this.logger.error(`[Nginx] Stats page (${statsUrl}) is unreachable`, {
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }

    if (!res.ok) {
      this.logger.error(`[Nginx] Error accessing stats page (${statsUrl}): HTTP ${res.status}`);
      await res.body?.cancel();
      return null;
    }

    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      if (signal?.aborted) {
        this.logger.debug(`[Nginx] Stats request to ${statsUrl} aborted while reading`);
        return null;
      }
      this.logger.error(`[Nginx] Failed to read stats page (${statsUrl})`, {
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }

    let stream: NginxRtmpStream | null;
    try {
      stream = selectStream(parseNginxStats(text), application, key);
    } catch (err) {
      this.logger.trace(text);
      this.logger.error(`[Nginx] Error parsing stats (${statsUrl})`, {
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }

    this.logger.trace(`[Nginx] ${application}/${key}`, { stream });
    return stream;
  }

  async sample(triggers: Triggers, signal?: AbortSignal): Promise<StreamSample> {
    const stats = await this.getStats(signal);
    return {
      bitrate: stats ? String(toKbps(stats.bwVideo)) : null,
      decision: classifySwitch(stats, triggers),
    };
  }

  async switch(triggers: Triggers, signal?: AbortSignal): Promise<SwitchType> {
    return classifySwitch(await this.getStats(signal), triggers);
  }

  async bitrate(signal?: AbortSignal): Promise<string | null> {
    const stats = await this.getStats(signal);
    if (!stats) return null;
    return String(toKbps(stats.bwVideo));
  }

  async sourceInfo(): Promise<string> {
    throw new UnsupportedOperationError('sourceInfo', this.type);
  }

  toConfig(): NginxConfig {
    return { ...this.config };
  }
}
