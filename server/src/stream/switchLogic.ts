import { toKbps } from './nginxStats.js';
import type { NginxRtmpStream, SwitchType, Triggers } from './types.js';

/**
 * Map the latest stats record to a scene decision. Branch order matters:
 * a configured offline trigger only fires on a nonzero bitrate, and zero
 * means the server has not sampled a freshly started stream yet.
 */
export function classifySwitch(stream: NginxRtmpStream | null, triggers: Triggers): SwitchType {
  if (!stream) return 'offline';

  const bitrate = toKbps(stream.bwVideo);

  if (triggers.offline !== undefined && bitrate > 0 && bitrate <= triggers.offline) {
    return 'offline';
  }

  if (bitrate === 0) return 'previous';

  if (triggers.low !== undefined && bitrate <= triggers.low) {
    return 'low';
  }

  return 'normal';
}
