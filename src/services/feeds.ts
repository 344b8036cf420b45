import axios from 'axios';
import { emitLog, emitProgress } from '../events';
import { errorMessage } from '../errors';

export type Category = 'country' | 'news' | 'movies' | 'sports';

/** Order in which categories appear in the merged playlist */
export const CATEGORY_ORDER: readonly Category[] = ['country', 'news', 'movies', 'sports'];

export interface FeedSource {
    category: Category;
    url: string;
}

export interface FeedResult extends FeedSource {
    body: string;
    /** Number of #EXTINF entries found in the body */
    count: number;
    error?: string;
}

// https://iptv-org.github.io/iptv/countries/{code}.m3u
// https://iptv-org.github.io/iptv/categories/{id}.m3u
export function buildFeedSources(countryCode: string, baseUrl: string): FeedSource[] {
    return CATEGORY_ORDER.map(category => ({
        category,
        url: category === 'country'
            ? `${baseUrl}/countries/${countryCode.toLowerCase()}.m3u`
            : `${baseUrl}/categories/${category}.m3u`
    }));
}

export function countEntries(body: string): number {
    return (body.match(/#EXTINF/g) || []).length;
}

/**
 * Download every feed one after another. A failed feed comes back with an
 * empty body so the remaining categories still make it into the playlist.
 */
export async function fetchFeeds(sources: FeedSource[], timeoutMs: number): Promise<FeedResult[]> {
    const results: FeedResult[] = [];

    for (let i = 0; i < sources.length; i++) {
        const source = sources[i];
        emitProgress(`Fetching ${source.category}...`, i, sources.length, 'fetch');
        try {
            const resp = await axios.get<string>(source.url, {
                timeout: timeoutMs,
                responseType: 'text'
            });
            const body = typeof resp.data === 'string' ? resp.data : String(resp.data);
            const count = countEntries(body);
            emitLog(`  ${source.category}: ${count} channels`, 'info');
            results.push({ ...source, body, count });
        } catch (e) {
            const message = errorMessage(e);
            emitLog(`${source.category} feed failed - ${message}`, 'warning');
            results.push({ ...source, body: '', count: 0, error: message });
        }
    }

    emitProgress(`Fetched ${sources.length} feeds`, sources.length, sources.length, 'fetch');
    return results;
}
