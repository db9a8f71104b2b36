import type { AdPosition } from '../modules/ad-record';

export type SponsoredAd = {
    title: string;
    url: string; // landing page, redirect already unwrapped
    display_url?: string;
    description?: string;
    price?: string;
    position: AdPosition;
    rank: number; // 1-based, within its block
};

export type ContactInfo = {
    title: string;
    phones: string[]; // digits only
    emails: string[];
    social_links: Record<string, string>;
    meta_tags: Record<string, string>;
};

export type FetchResult = {
    url: string;
    status: number;
    data: string; // HTML content
    finalUrl: string;
};

export interface PageFetcher {
    fetch(url: string): Promise<FetchResult>;
}

export type SearchTarget = {
    keyword: string;
    location: string;
};
