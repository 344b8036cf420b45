import axios from 'axios';
import * as zlib from 'zlib';
import { promisify } from 'util';
import sax from 'sax';
import { AppConfig } from '../config';
import { emitLog, emitProgress } from '../events';
import { errorMessage } from '../errors';
import { EnrichedChannel, EnrichmentResult } from './iptv-org';

const gzip = promisify(zlib.gzip);
const gunzip = promisify(zlib.gunzip);

export interface GuideRequest {
    channels: EnrichedChannel[];
    country: string;
    lang: string;
}

export interface GuideArtifact {
    /** Always gzip-compressed */
    data: Buffer;
    /** True when the service already sent gzip and the bytes were kept as-is */
    precompressed: boolean;
}

export interface GuideSummary {
    channels: number;
    programmes: number;
}

/**
 * Unset endpoints and the values people leave in example env files
 * (EPG_FETCHER_URL=https://<your-worker>/epg) count as "not configured".
 */
export function isPlaceholderUrl(url: string): boolean {
    const value = url.trim();
    if (!value) return true;
    if (/<[^>]*>|your[-_]|change-?me/i.test(value)) return true;
    try {
        const parsed = new URL(value);
        return parsed.protocol !== 'http:' && parsed.protocol !== 'https:';
    } catch {
        return true;
    }
}

export function isGzip(data: Buffer): boolean {
    return data.length >= 2 && data[0] === 0x1f && data[1] === 0x8b;
}

function headerValue(value: unknown): string {
    if (value === undefined || value === null) return '';
    return String(value).toLowerCase();
}

export function buildGuideRequest(channels: EnrichedChannel[], country: string, lang: string): GuideRequest {
    return { channels, country, lang };
}

/**
 * POST the enriched channel list to the EPG fetcher and return the guide as
 * gzip bytes. Returns null when the request is skipped or fails.
 */
export async function requestGuide(
    enrichment: EnrichmentResult,
    country: string,
    config: AppConfig
): Promise<GuideArtifact | null> {
    const { channels, matched } = enrichment;
    if (isPlaceholderUrl(config.epgFetcherUrl)) {
        emitLog('EPG_FETCHER_URL not set - skipping', 'warning');
        return null;
    }
    if (channels.length === 0) {
        emitLog('No channel IDs found - skipping EPG', 'warning');
        return null;
    }

    emitLog(`Sending ${channels.length} channels (${matched} with full metadata) to epg-fetcher...`, 'info');
    emitProgress('Waiting for guide data...', 0, 1, 'epg');

    try {
        const resp = await axios.post<ArrayBuffer>(
            config.epgFetcherUrl,
            buildGuideRequest(channels, country, config.defaultLang),
            {
                headers: { 'Content-Type': 'application/json' },
                timeout: config.epgTimeoutMs,
                responseType: 'arraybuffer',
                decompress: false
            }
        );

        const body = Buffer.from(resp.data);
        const encoding = headerValue(resp.headers['content-encoding']);
        const contentType = headerValue(resp.headers['content-type']);
        const declaredGzip = encoding.includes('gzip') || contentType.includes('gzip');

        const precompressed = declaredGzip && isGzip(body);
        const data = precompressed ? body : await gzip(body);

        emitProgress(`Guide received (${Math.round(data.length / 1024)} KB)`, 1, 1, 'epg');
        return { data, precompressed };
    } catch (e) {
        emitLog(`EPG fetch failed - ${errorMessage(e)}`, 'warning');
        emitProgress('Guide request failed', 1, 1, 'epg');
        return null;
    }
}

/**
 * Count <channel> and <programme> elements of a gzip XMLTV document.
 * Throws if the data is not gzip or not well-formed XML.
 */
export async function summarizeGuide(data: Buffer): Promise<GuideSummary> {
    const xml = (await gunzip(data)).toString('utf8');
    const summary: GuideSummary = { channels: 0, programmes: 0 };

    const parser = sax.parser(true, { trim: true });
    parser.onerror = (err: Error) => {
        throw err;
    };
    parser.onopentag = node => {
        if (node.name === 'channel') summary.channels++;
        else if (node.name === 'programme') summary.programmes++;
    };
    parser.write(xml).close();

    return summary;
}
