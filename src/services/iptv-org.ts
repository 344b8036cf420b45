import axios from 'axios';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { AppConfig } from '../config';
import { emitLog, emitProgress } from '../events';
import { errorMessage } from '../errors';

/** Column of the semicolon-separated language list when the header does not name it */
export const DEFAULT_LANGUAGE_COLUMN = 6;

export interface ChannelDatabaseEntry {
    name: string;
    lang: string;
}

export interface EpgSourceEntry {
    site: string;
    site_id: string;
}

export interface EnrichedChannel {
    xmltv_id: string;
    name?: string;
    lang?: string;
    site?: string;
    site_id?: string;
}

export interface EnrichmentResult {
    channels: EnrichedChannel[];
    /** Channels found in the EPG source list */
    matched: number;
    unmatched: number;
}

const siteField = z
    .union([z.string(), z.number()])
    .nullish()
    .transform(v => (v === null || v === undefined ? '' : String(v)));

const EpgChannelSchema = z.object({
    xmltv_id: z.string().nullish(),
    site: siteField,
    site_id: siteField
});

const CSV_OPTIONS = {
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true
};

/**
 * Parse the whole document, which keeps quoted fields that span lines. When a
 * stray quote breaks that, parse line by line so only the broken rows are lost.
 */
function parseCsvRows(csv: string): string[][] {
    try {
        const rows: string[][] = parse(csv, CSV_OPTIONS);
        return rows;
    } catch (e) {
        emitLog(`Channel database is not clean CSV (${errorMessage(e)}), reading it line by line`, 'warning');
    }

    const rows: string[][] = [];
    let skipped = 0;
    for (const line of csv.split(/\r?\n/)) {
        try {
            const parsed: string[][] = parse(line, { ...CSV_OPTIONS, relax_quotes: true });
            rows.push(...parsed);
        } catch {
            skipped++;
        }
    }
    if (skipped > 0) emitLog(`Channel database: skipped ${skipped} malformed rows`, 'warning');
    return rows;
}

/**
 * Parse the iptv-org database channels.csv into id -> { name, lang }.
 * Rows without enough columns or without an id are skipped.
 */
export function parseChannelDatabase(csv: string): ReadonlyMap<string, ChannelDatabaseEntry> {
    const rows = parseCsvRows(csv);

    const lookup = new Map<string, ChannelDatabaseEntry>();
    if (rows.length === 0) return lookup;

    const header = rows[0].map(h => h.toLowerCase());
    const named = header.indexOf('languages');
    const langColumn = named >= 0 ? named : DEFAULT_LANGUAGE_COLUMN;

    for (const fields of rows.slice(1)) {
        if (fields.length <= Math.max(1, langColumn)) continue;
        const id = fields[0].trim();
        if (!id) continue;
        lookup.set(id, {
            name: fields[1].trim(),
            lang: fields[langColumn].split(';')[0].trim()
        });
    }
    return lookup;
}

/**
 * Parse the iptv-org EPG channels.json into xmltv_id -> { site, site_id }.
 * Throws when the payload is not a list at all.
 */
export function parseEpgSources(data: unknown): ReadonlyMap<string, EpgSourceEntry> {
    if (!Array.isArray(data)) {
        throw new Error('EPG channel list is not an array');
    }

    const lookup = new Map<string, EpgSourceEntry>();
    for (const item of data) {
        const parsed = EpgChannelSchema.safeParse(item);
        if (!parsed.success) continue;
        const id = parsed.data.xmltv_id?.trim();
        if (!id) continue;
        lookup.set(id, { site: parsed.data.site, site_id: parsed.data.site_id });
    }
    return lookup;
}

export async function loadChannelDatabase(config: AppConfig): Promise<ReadonlyMap<string, ChannelDatabaseEntry>> {
    try {
        const resp = await axios.get<string>(config.channelDatabaseUrl, {
            timeout: config.fetchTimeoutMs,
            responseType: 'text'
        });
        const lookup = parseChannelDatabase(String(resp.data));
        emitLog(`Channel database: ${lookup.size} entries`, 'info');
        return lookup;
    } catch (e) {
        emitLog(`Channel database failed - ${errorMessage(e)}`, 'warning');
        return new Map();
    }
}

export async function loadEpgSources(config: AppConfig): Promise<ReadonlyMap<string, EpgSourceEntry>> {
    try {
        const resp = await axios.get<unknown>(config.epgChannelsUrl, { timeout: config.fetchTimeoutMs });
        const lookup = parseEpgSources(resp.data);
        emitLog(`EPG channels list: ${lookup.size} entries`, 'info');
        return lookup;
    } catch (e) {
        emitLog(`EPG channels list failed - ${errorMessage(e)}`, 'warning');
        return new Map();
    }
}

/**
 * Left-join every channel id against both catalogs. A miss in one catalog
 * only leaves that catalog's fields off the record.
 */
export function enrichChannels(
    ids: ReadonlySet<string>,
    channelDb: ReadonlyMap<string, ChannelDatabaseEntry>,
    epgSources: ReadonlyMap<string, EpgSourceEntry>
): EnrichmentResult {
    const channels: EnrichedChannel[] = [];
    let matched = 0;

    for (const id of ids) {
        const entry: EnrichedChannel = { xmltv_id: id };

        const info = channelDb.get(id);
        if (info) {
            entry.name = info.name;
            entry.lang = info.lang;
        }

        const source = epgSources.get(id);
        if (source) {
            entry.site = source.site;
            entry.site_id = source.site_id;
            matched++;
        }
        channels.push(entry);
    }

    return { channels, matched, unmatched: channels.length - matched };
}

/**
 * Load both catalogs fresh and enrich the given ids. Nothing is kept
 * between runs.
 */
export async function enrichFromCatalogs(ids: ReadonlySet<string>, config: AppConfig): Promise<EnrichmentResult> {
    emitProgress('Loading channel database...', 0, 2, 'enrich');
    const channelDb = await loadChannelDatabase(config);
    emitProgress('Loading EPG channels list...', 1, 2, 'enrich');
    const epgSources = await loadEpgSources(config);

    const result = enrichChannels(ids, channelDb, epgSources);
    emitProgress(`Enriched ${result.channels.length} channels (${result.matched} with EPG source)`, 2, 2, 'enrich');
    return result;
}
