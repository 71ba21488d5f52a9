export interface FixtureStream {
  name: string;
  bwVideo: number | string;
  meta?: string;
}

export const H264_AAC_META =
  '<meta>' +
  '<video><width>1280</width><height>720</height><frame_rate>30</frame_rate>' +
  '<codec>H264</codec><profile>Main</profile><compat>0</compat><level>3.1</level></video>' +
  '<audio><codec>AAC</codec><profile>LC</profile><channels>2</channels><sample_rate>44100</sample_rate></audio>' +
  '</meta>';

/** Build a stat page shaped like the one nginx-rtmp serves. */
export function statXml(apps: Record<string, FixtureStream[]>): string {
  const body = Object.entries(apps)
    .map(([name, streams]) => {
      const streamXml = streams
        .map(
          (s) =>
            `        <stream><name>${s.name}</name><time>4200</time><bw_in>0</bw_in>` +
            `<bw_video>${s.bwVideo}</bw_video>${s.meta ?? ''}</stream>`,
        )
        .join('\n');
      return [
        '    <application>',
        `      <name>${name}</name>`,
        '      <live>',
        streamXml,
        `        <nclients>${streams.length}</nclients>`,
        '      </live>',
        '    </application>',
      ].join('\n');
    })
    .join('\n');

  return [
    '<?xml version="1.0" encoding="utf-8" ?>',
    '<?xml-stylesheet type="text/xsl" href="stat.xsl" ?>',
    '<rtmp>',
    '  <nginx_version>1.25.3</nginx_version>',
    '  <server>',
    body,
    '  </server>',
    '</rtmp>',
    '',
  ].join('\n');
}

export const TWO_APPS_XML = statXml({
  live: [
    { name: 'cam1', bwVideo: 2048000 },
    { name: 'cam2', bwVideo: 512000, meta: H264_AAC_META },
  ],
  other: [
    { name: 'cam1', bwVideo: 1024 },
    { name: 'cam2', bwVideo: 0 },
  ],
});
