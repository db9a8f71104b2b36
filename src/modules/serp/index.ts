import * as cheerio from 'cheerio';
import { AdPosition } from '../ad-record';
import { SponsoredAd } from '../../types';

const AD_BLOCKS: { selector: string; position: AdPosition }[] = [
    { selector: '#tads', position: AdPosition.TOP },
    { selector: '#rhs', position: AdPosition.SIDEBAR },
    { selector: '#bottomads', position: AdPosition.BOTTOM }
];

const PRICE_PATTERN = /(?:[€£$]\s?\d+(?:[.,]\d+)*)|(?:\d+(?:[.,]\d+)*\s?(?:€|£|EUR\b|GBP\b|USD\b))/i;

const clean = (text: string): string => text.replace(/\s+/g, ' ').trim();

export class SerpParser {

    static buildSearchUrl(baseUrl: string, keyword: string, location: string): string {
        const url = new URL('/search', baseUrl);
        url.searchParams.set('q', `${keyword} ${location}`.trim());
        return url.href;
    }

    /**
     * Ad links usually point at an ad-click redirect; the landing page sits in
     * its `adurl` parameter. Returns null for anything that is not http(s).
     */
    static resolveLandingUrl(href: string, baseUrl: string): string | null {
        let resolved: URL;
        try {
            resolved = new URL(href, baseUrl);
            const target = resolved.searchParams.get('adurl');
            if (target) {
                resolved = new URL(target);
            }
        } catch {
            return null;
        }

        if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') return null;
        return resolved.href;
    }

    static extractPrice(text: string): string | undefined {
        const match = text.match(PRICE_PATTERN);
        return match ? clean(match[0]) : undefined;
    }

    /**
     * Sponsored listings found in the top, sidebar and bottom ad blocks, in
     * page order. Duplicated landing pages keep their first occurrence.
     */
    static parseAds(html: string, baseUrl: string): SponsoredAd[] {
        const $ = cheerio.load(html);
        const ads: SponsoredAd[] = [];
        const seen = new Set<string>();

        for (const block of AD_BLOCKS) {
            let rank = 0;

            $(block.selector).find('[data-text-ad]').each((_, el) => {
                const ad = $(el);
                const link = ad.find('a[href]').first();
                const href = link.attr('href');
                if (!href) return;

                const url = SerpParser.resolveLandingUrl(href, baseUrl);
                if (!url || seen.has(url)) return;

                const title = clean(
                    ad.find('[role="heading"]').first().text() ||
                    ad.find('h3').first().text() ||
                    link.text()
                );
                if (!title) return;

                seen.add(url);
                rank++;

                const description = clean(ad.find('.yDYNvb, .MUxGbd, [data-sncf]').first().text());
                const displayUrl = clean(ad.find('cite').first().text()) || ad.find('[data-dtld]').attr('data-dtld');

                ads.push({
                    title,
                    url,
                    display_url: displayUrl || undefined,
                    description: description || undefined,
                    price: SerpParser.extractPrice(clean(ad.text())),
                    position: block.position,
                    rank
                });
            });
        }

        return ads;
    }
}
