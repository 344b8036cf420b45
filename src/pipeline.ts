import { AppConfig } from './config';
import { emitLog, eventBus } from './events';
import { errorMessage, PipelineBusyError } from './errors';
import { startJob, completeJob, getJobStatus, RunReport } from './job';
import { resolveCountryCode, resolveRegionName } from './services/region';
import { buildFeedSources, fetchFeeds, Category } from './services/feeds';
import { mergePlaylists, extractChannelIds } from './services/playlist';
import { enrichFromCatalogs } from './services/iptv-org';
import { requestGuide, summarizeGuide } from './services/epg';
import { publishOutputs } from './services/publish';

/**
 * One publish cycle:
 * 1. Resolve the region and fetch the country + topic feeds
 * 2. Merge them into one playlist and collect unique tvg-ids
 * 3. Enrich the ids from the iptv-org channel database and EPG channel list
 * 4. Ask the EPG fetcher for guide data
 * 5. Write playlist, guide and landing page
 *
 * Upstream failures only shrink the output. Filesystem errors are thrown.
 */
export async function runPipeline(config: AppConfig): Promise<RunReport> {
    if (getJobStatus().running) {
        throw new PipelineBusyError();
    }

    startJob();
    const started = Date.now();
    let report: RunReport | null = null;
    try {
        const country = await resolveCountryCode(config);
        const regionName = await resolveRegionName(country, config);
        emitLog(`Building playlist for ${regionName} (${country.toUpperCase()})`, 'info');

        // 1. Feeds
        const feeds = await fetchFeeds(buildFeedSources(country, config.iptvBaseUrl), config.fetchTimeoutMs);
        const totals: Record<Category, number> = { country: 0, news: 0, movies: 0, sports: 0 };
        for (const feed of feeds) totals[feed.category] = feed.count;
        const totalEntries = feeds.reduce((sum, f) => sum + f.count, 0);

        // 2. Merge + ids
        const playlist = mergePlaylists(feeds, regionName);
        const ids = extractChannelIds(feeds.map(f => f.body));
        emitLog(`Playlist: ${totalEntries} channels, ${ids.size} unique IDs`, 'info');

        // 3. Enrich
        const enrichment = await enrichFromCatalogs(ids, config);
        emitLog(`EPG sources: ${enrichment.matched} matched, ${enrichment.unmatched} unmatched`, 'info');

        // 4. Guide
        const guide = await requestGuide(enrichment, country, config);
        if (guide) {
            try {
                const summary = await summarizeGuide(guide.data);
                emitLog(`Guide contains ${summary.channels} channels and ${summary.programmes} programmes`, 'info');
            } catch (e) {
                emitLog(`Guide is not readable XMLTV - ${errorMessage(e)}`, 'warning');
            }
        }

        // 5. Publish
        const published = publishOutputs(config.publishDir, {
            playlist,
            guide,
            summary: { regionName, totalEntries, uniqueIds: ids.size, generatedAt: new Date() }
        }, config.publicBaseUrl);

        report = {
            country,
            regionName,
            feeds: totals,
            totalEntries,
            uniqueIds: ids.size,
            epgMatched: enrichment.matched,
            epgUnmatched: enrichment.unmatched,
            guideBytes: published.guideBytes,
            filesGenerated: published.files,
            durationMs: Date.now() - started
        };
        eventBus.emit('report', report);
        emitLog(`Done. Published ${published.files.join(', ')} to ${config.publishDir}`, 'success');
        return report;
    } finally {
        completeJob(report);
    }
}
