import { z } from 'zod';
import * as path from 'path';
import { ConfigError } from './errors';

const optionalString = z
    .string()
    .trim()
    .optional()
    .transform(v => (v ? v : undefined));

/** Blank numeric variables (PORT=) fall back to the default like unset ones */
const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const EnvSchema = z.object({
    COUNTRY_CODE: optionalString,
    EPG_FETCHER_URL: z.string().trim().default(''),
    PUBLISH_DIR: optionalString,
    PUBLIC_BASE_URL: z.string().trim().default(''),
    IPTV_BASE_URL: z.string().trim().url().default('https://iptv-org.github.io/iptv'),
    CHANNEL_DATABASE_URL: z
        .string()
        .trim()
        .url()
        .default('https://raw.githubusercontent.com/iptv-org/database/master/data/channels.csv'),
    EPG_CHANNELS_URL: z.string().trim().url().default('https://iptv-org.github.io/epg/channels.json'),
    COUNTRIES_URL: z.string().trim().url().default('https://iptv-org.github.io/api/countries.json'),
    GEO_LOOKUP_URL: z.string().trim().url().default('https://ipapi.co/country/'),
    FETCH_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(30000)),
    EPG_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(120000)),
    EPG_LANG: z.string().trim().min(1).default('en'),
    PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65535).default(3000)),
    SCHEDULE: z.string().trim().default('0 3 * * *'),
});

export interface AppConfig {
    /** Lower-cased ISO code, or null when it has to be detected */
    countryCode: string | null;
    epgFetcherUrl: string;
    publishDir: string;
    publicBaseUrl: string;
    iptvBaseUrl: string;
    channelDatabaseUrl: string;
    epgChannelsUrl: string;
    countriesUrl: string;
    geoLookupUrl: string;
    fetchTimeoutMs: number;
    epgTimeoutMs: number;
    defaultLang: string;
    port: number;
    /** Cron expression; empty disables the scheduled run */
    schedule: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration - ${details}`);
    }
    const e = parsed.data;

    return {
        countryCode: e.COUNTRY_CODE ? e.COUNTRY_CODE.toLowerCase() : null,
        epgFetcherUrl: e.EPG_FETCHER_URL,
        publishDir: e.PUBLISH_DIR ? path.resolve(e.PUBLISH_DIR) : path.join(process.cwd(), 'docs'),
        publicBaseUrl: e.PUBLIC_BASE_URL.replace(/\/+$/, ''),
        iptvBaseUrl: e.IPTV_BASE_URL.replace(/\/+$/, ''),
        channelDatabaseUrl: e.CHANNEL_DATABASE_URL,
        epgChannelsUrl: e.EPG_CHANNELS_URL,
        countriesUrl: e.COUNTRIES_URL,
        geoLookupUrl: e.GEO_LOOKUP_URL,
        fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
        epgTimeoutMs: e.EPG_TIMEOUT_MS,
        defaultLang: e.EPG_LANG,
        port: e.PORT,
        schedule: e.SCHEDULE,
    };
}
