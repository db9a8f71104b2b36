import * as cheerio from 'cheerio';
import { ContactInfo } from '../../types';

const SOCIAL_NETWORKS: { network: string; domains: string[] }[] = [
    { network: 'facebook', domains: ['facebook.com', 'fb.com'] },
    { network: 'instagram', domains: ['instagram.com'] },
    { network: 'linkedin', domains: ['linkedin.com'] },
    { network: 'twitter', domains: ['twitter.com', 'x.com'] },
    { network: 'youtube', domains: ['youtube.com'] },
    { network: 'tiktok', domains: ['tiktok.com'] }
];

// International prefix, trunk zero or an opening parenthesis, then digits and separators
const PHONE_PATTERN = /(?:\+|\(|\b0)[\d\s().\/-]{6,}\d/g;
const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

const MIN_PHONE_DIGITS = 7;
const MAX_PHONE_DIGITS = 15;

export class ContactExtractor {

    static extract(html: string, baseUrl?: string): ContactInfo {
        const $ = cheerio.load(html);

        const title = $('title').first().text().trim() || $('meta[property="og:title"]').attr('content')?.trim() || '';

        const metaTags: Record<string, string> = {};
        $('meta[name], meta[property]').each((_, el) => {
            const key = ($(el).attr('name') || $(el).attr('property') || '').trim().toLowerCase();
            const content = $(el).attr('content');
            if (key && content !== undefined && !(key in metaTags)) {
                metaTags[key] = content.trim();
            }
        });

        const phones = new Set<string>();
        const emails = new Set<string>();
        const socialLinks: Record<string, string> = {};

        $('a[href]').each((_, el) => {
            const href = ($(el).attr('href') || '').trim();
            const lower = href.toLowerCase();

            if (lower.startsWith('tel:')) {
                const phone = ContactExtractor.normalizePhone(href.slice(4));
                if (phone) phones.add(phone);
                return;
            }
            if (lower.startsWith('mailto:')) {
                const email = href.slice(7).split('?')[0].trim().toLowerCase();
                if (email) emails.add(email);
                return;
            }

            const network = ContactExtractor.socialNetwork(href, baseUrl);
            if (network && !(network.name in socialLinks)) {
                socialLinks[network.name] = network.url;
            }
        });

        $('script, style, noscript').remove();
        const text = $('body').text().replace(/\s+/g, ' ');

        for (const candidate of text.match(PHONE_PATTERN) || []) {
            const phone = ContactExtractor.normalizePhone(candidate);
            if (phone) phones.add(phone);
        }
        for (const email of text.match(EMAIL_PATTERN) || []) {
            emails.add(email.toLowerCase());
        }

        return {
            title,
            phones: [...phones],
            emails: [...emails],
            social_links: socialLinks,
            meta_tags: metaTags
        };
    }

    /**
     * Digits only, or null when the digit count cannot be a phone number.
     */
    static normalizePhone(raw: string): string | null {
        const digits = raw.replace(/\D/g, '');
        if (digits.length < MIN_PHONE_DIGITS || digits.length > MAX_PHONE_DIGITS) return null;
        return digits;
    }

    static socialNetwork(href: string, baseUrl?: string): { name: string; url: string } | null {
        let url: URL;
        try {
            url = new URL(href, baseUrl);
        } catch {
            return null;
        }
        if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;

        const host = url.hostname.toLowerCase().replace(/^www\./, '');
        const match = SOCIAL_NETWORKS.find(({ domains }) =>
            domains.some((domain) => host === domain || host.endsWith(`.${domain}`))
        );
        return match ? { name: match.network, url: url.href } : null;
    }
}
