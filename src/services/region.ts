import axios from 'axios';
import { z } from 'zod';
import { AppConfig } from '../config';
import { emitLog } from '../events';
import { errorMessage } from '../errors';

export const FALLBACK_COUNTRY = 'us';

const CountrySchema = z.object({
    name: z.string(),
    code: z.string()
});

/**
 * Ask the geo-IP service which country this machine is in.
 * Returns a lower-cased two-letter code, or null if the answer is unusable.
 */
export async function detectCountry(config: AppConfig): Promise<string | null> {
    try {
        const resp = await axios.get<string>(config.geoLookupUrl, {
            timeout: config.fetchTimeoutMs,
            responseType: 'text'
        });
        const code = String(resp.data).trim().toLowerCase();
        if (/^[a-z]{2}$/.test(code)) return code;
        emitLog(`Country detection returned an unexpected answer: "${code.substring(0, 20)}"`, 'warning');
    } catch (e) {
        emitLog(`Country detection failed - ${errorMessage(e)}`, 'warning');
    }
    return null;
}

export async function resolveCountryCode(config: AppConfig): Promise<string> {
    if (config.countryCode) return config.countryCode;

    const detected = await detectCountry(config);
    if (detected) {
        emitLog(`Detected country: ${detected.toUpperCase()}`, 'info');
        return detected;
    }
    emitLog(`Falling back to country ${FALLBACK_COUNTRY.toUpperCase()}`, 'warning');
    return FALLBACK_COUNTRY;
}

// https://iptv-org.github.io/api/countries.json -> [{ name, code, languages, flag }]
export async function resolveRegionName(code: string, config: AppConfig): Promise<string> {
    const fallback = code.toUpperCase();
    try {
        const resp = await axios.get<unknown>(config.countriesUrl, { timeout: config.fetchTimeoutMs });
        if (!Array.isArray(resp.data)) return fallback;

        for (const item of resp.data) {
            const country = CountrySchema.safeParse(item);
            if (country.success && country.data.code.toLowerCase() === code.toLowerCase()) {
                return country.data.name;
            }
        }
    } catch (e) {
        emitLog(`Country list unavailable - ${errorMessage(e)}`, 'warning');
    }
    return fallback;
}
