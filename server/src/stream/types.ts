export type StreamServerType = 'nginx';

/** Stats page location and the stream it should isolate. */
export interface NginxConfig {
  type: 'nginx';
  statsUrl: string;
  application: string;
  key: string;
}

export type StreamServerConfig = NginxConfig;

export interface NginxRtmpStats {
  server: {
    application: NginxRtmpApp[];
  };
}

export interface NginxRtmpApp {
  name: string;
  live: {
    stream: NginxRtmpStream[];
  };
}

export interface NginxRtmpStream {
  name: string;
  bwVideo: number; // bits per second
  meta?: StreamMeta;
}

export interface StreamMeta {
  video: {
    width: number;
    height: number;
    frameRate: number;
    codec: string;
    profile?: string;
    compat?: number;
    level?: number;
  };
  audio: {
    codec: string;
    profile?: string;
    channels?: number;
    sampleRate?: number;
  };
}

/** Operator cutoffs in kbps. An unset trigger disables its branch. */
export interface Triggers {
  offline?: number;
  low?: number;
}

export type SwitchType = 'offline' | 'previous' | 'low' | 'normal';
