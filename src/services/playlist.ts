import { Category, CATEGORY_ORDER } from './feeds';

export const PLAYLIST_HEADER = '#EXTM3U';

const BANNER_RULE = '# ======================================';

export interface CategoryBody {
    category: Category;
    body: string;
}

export function categoryLabel(category: Category, regionName: string): string {
    return category === 'country' ? `LOCAL - ${regionName}` : category.toUpperCase();
}

/**
 * Remove the #EXTM3U header line (and any attributes on it, such as
 * x-tvg-url) from a single feed so it can be embedded in the merged file.
 */
export function stripHeader(body: string): string {
    return body
        .replace(/^\uFEFF/, '')
        .replace(/^[ \t]*#EXTM3U[^\n]*(\n|$)/gm, '')
        .trim();
}

/**
 * Concatenate category feeds into one playlist. Categories are always
 * emitted in CATEGORY_ORDER, whatever order the bodies arrive in; empty
 * categories get no banner.
 */
export function mergePlaylists(feeds: CategoryBody[], regionName: string): string {
    const bodies = new Map(feeds.map(f => [f.category, f.body]));

    let combined = `${PLAYLIST_HEADER}\n\n`;
    for (const category of CATEGORY_ORDER) {
        const content = stripHeader(bodies.get(category) || '');
        if (!content) continue;

        combined += `${BANNER_RULE}\n# ${categoryLabel(category, regionName)}\n${BANNER_RULE}\n`;
        combined += `${content}\n\n`;
    }
    return combined;
}

/**
 * Collect every tvg-id across all feeds. Categories are not tracked past
 * this point; an id listed in several feeds appears once.
 */
export function extractChannelIds(bodies: string[]): ReadonlySet<string> {
    const ids = new Set<string>();
    for (const body of bodies) {
        for (const m of body.matchAll(/tvg-id="([^"]*)"/g)) {
            const id = m[1].trim();
            if (id) ids.add(id);
        }
    }
    return ids;
}
