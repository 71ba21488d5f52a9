import type { StreamServerConfig, StreamServerType, SwitchType, Triggers } from './types.js';

export class UnsupportedOperationError extends Error {
  constructor(operation: string, serverType: StreamServerType) {
    super(`${operation} is not supported by the ${serverType} stream server`);
    this.name = 'UnsupportedOperationError';
  }
}

export interface SwitchLogic {
  /** Which scene to switch to. Never rejects; missing stats resolve to 'offline'. */
  switch(triggers: Triggers, signal?: AbortSignal): Promise<SwitchType>;
}

export interface StreamServersCommands {
  /** Current video bitrate in kbps, or null when no stats are available. */
  bitrate(signal?: AbortSignal): Promise<string | null>;
  sourceInfo(signal?: AbortSignal): Promise<string>;
}

/** Bitrate report and decision taken from the same stats fetch. */
export interface StreamSample {
  bitrate: string | null;
  decision: SwitchType;
}

export interface StreamServer extends SwitchLogic, StreamServersCommands {
  readonly type: StreamServerType;
  sample(triggers: Triggers, signal?: AbortSignal): Promise<StreamSample>;
  toConfig(): StreamServerConfig;
}
