import * as fs from 'fs';
import * as path from 'path';
import { emitLog, emitProgress, emitProgressComplete } from '../events';
import { GuideArtifact } from './epg';

export const PLAYLIST_FILE = 'playlist.m3u8';
export const GUIDE_FILE = 'epg.xml.gz';
export const LANDING_FILE = 'index.html';

export interface LandingSummary {
    regionName: string;
    totalEntries: number;
    uniqueIds: number;
    generatedAt: Date;
}

export interface PublishInput {
    playlist: string;
    guide: GuideArtifact | null;
    summary: LandingSummary;
}

export interface PublishResult {
    files: string[];
    playlistBytes: number;
    guideBytes: number | null;
}

export function getText(val: unknown): string {
    if (val === undefined || val === null) return "";
    return String(val)
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}

export function publicUrl(baseUrl: string, file: string): string {
    return baseUrl ? `${baseUrl}/${file}` : file;
}

export function renderLandingPage(summary: LandingSummary, baseUrl: string, hasGuide: boolean): string {
    const playlistUrl = publicUrl(baseUrl, PLAYLIST_FILE);
    const guideUrl = publicUrl(baseUrl, GUIDE_FILE);

    const rows = [
        `<li>Playlist: <a href="${getText(playlistUrl)}">${getText(playlistUrl)}</a></li>`,
        hasGuide
            ? `<li>Guide (XMLTV): <a href="${getText(guideUrl)}">${getText(guideUrl)}</a></li>`
            : `<li>Guide (XMLTV): not available yet</li>`
    ];

    return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>IPTV playlist - ${getText(summary.regionName)}</title>
</head>
<body>
<h1>IPTV playlist - ${getText(summary.regionName)}</h1>
<ul>
${rows.join('\n')}
</ul>
<p>${summary.totalEntries} channels, ${summary.uniqueIds} unique guide ids. Updated ${summary.generatedAt.toISOString()}.</p>
<p>Point your player's M3U URL at the playlist and its EPG URL at the guide.</p>
</body>
</html>
`;
}

/**
 * Write the run's output files, replacing whatever a previous run left.
 * A guide from an earlier run is kept when this run produced none.
 * Filesystem errors are not caught here.
 */
export function publishOutputs(dir: string, input: PublishInput, baseUrl: string): PublishResult {
    fs.mkdirSync(dir, { recursive: true });
    const files: string[] = [];

    emitProgress('Writing playlist...', 0, 3, 'publish');
    const playlistPath = path.join(dir, PLAYLIST_FILE);
    fs.writeFileSync(playlistPath, input.playlist, 'utf-8');
    files.push(PLAYLIST_FILE);
    const playlistBytes = Buffer.byteLength(input.playlist, 'utf-8');
    emitLog(`Saved ${PLAYLIST_FILE} (${(playlistBytes / 1024).toFixed(1)} KB)`, 'success');

    let guideBytes: number | null = null;
    const guidePath = path.join(dir, GUIDE_FILE);
    if (input.guide) {
        emitProgress('Writing guide...', 1, 3, 'publish');
        fs.writeFileSync(guidePath, input.guide.data);
        files.push(GUIDE_FILE);
        guideBytes = input.guide.data.length;
        emitLog(`EPG saved: ${Math.floor(guideBytes / 1024)} KB`, 'success');
    }

    emitProgress('Writing landing page...', 2, 3, 'publish');
    const landing = renderLandingPage(input.summary, baseUrl, fs.existsSync(guidePath));
    fs.writeFileSync(path.join(dir, LANDING_FILE), landing, 'utf-8');
    files.push(LANDING_FILE);

    emitProgressComplete('publish', `Published ${files.length} files`, 3);
    return { files, playlistBytes, guideBytes };
}
