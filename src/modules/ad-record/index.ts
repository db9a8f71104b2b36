import { URLValidationError, ValidationError } from '../../utils/errors';

export enum AdPosition {
    TOP = 'TOP',
    SIDEBAR = 'SIDEBAR',
    BOTTOM = 'BOTTOM',
    UNKNOWN = 'UNKNOWN',
}

const POSITION_BY_INT: Record<number, AdPosition> = {
    1: AdPosition.TOP,
    2: AdPosition.SIDEBAR,
    3: AdPosition.BOTTOM
};

export const adPositionFromInt = (value: number): AdPosition => POSITION_BY_INT[value] ?? AdPosition.UNKNOWN;

export type AdRecordData = {
    keyword: string;
    location: string;
    website_url: string;
    title: string;
    description?: string | null;
    phone_number?: string | null;
    price?: string | null;
    email?: string | null;
    social_links?: Record<string, string>;
    meta_tags?: Record<string, string>;
    /** Enum name or 1-based position. */
    ad_position?: AdPosition | string | number;
    timestamp?: string;
};

export type AdRecordJSON = {
    keyword: string;
    location: string;
    website_url: string;
    title: string;
    description: string | null;
    phone_number: string | null;
    price: string | null;
    email: string | null;
    social_links: Record<string, string>;
    meta_tags: Record<string, string>;
    ad_position: AdPosition;
    timestamp: string;
};

const toPosition = (value: AdRecordData['ad_position']): AdPosition => {
    if (value === undefined) return AdPosition.UNKNOWN;
    if (typeof value === 'number') return adPositionFromInt(value);
    const position = Object.values(AdPosition).find((p: string) => p === value);
    if (!position) {
        throw new ValidationError(`Unknown ad position: ${value}`);
    }
    return position;
};

const requireText = (value: string | undefined, field: string): string => {
    const trimmed = (value ?? '').trim();
    if (!trimmed) {
        throw new ValidationError(`${field} cannot be empty`);
    }
    return trimmed;
};

const optionalText = (value: string | null | undefined): string | null => {
    if (value === null || value === undefined) return null;
    return value.trim() || null;
};

/**
 * One sponsored listing with the contact details found on its landing page.
 */
export class AdRecord {
    readonly keyword: string;
    readonly location: string;
    readonly websiteUrl: string;
    readonly title: string;
    readonly description: string | null;
    readonly phoneNumber: string | null;
    readonly price: string | null;
    readonly email: string | null;
    readonly socialLinks: Record<string, string>;
    readonly metaTags: Record<string, string>;
    readonly position: AdPosition;
    readonly timestamp: string;

    constructor(data: AdRecordData) {
        if (!data.website_url || !data.website_url.trim()) {
            throw new URLValidationError('website_url cannot be empty');
        }
        this.title = requireText(data.title, 'title');
        this.keyword = requireText(data.keyword, 'keyword');
        this.location = requireText(data.location, 'location');

        this.websiteUrl = data.website_url.trim();
        AdRecord.validateUrl(this.websiteUrl);

        this.description = optionalText(data.description);
        this.phoneNumber = data.phone_number ? AdRecord.cleanPhoneNumber(data.phone_number) : null;
        this.price = optionalText(data.price);
        this.email = data.email ? data.email.trim().toLowerCase() : null;
        this.socialLinks = { ...(data.social_links ?? {}) };
        this.metaTags = { ...(data.meta_tags ?? {}) };
        this.position = toPosition(data.ad_position);
        this.timestamp = data.timestamp ?? new Date().toISOString();
    }

    static validateUrl(url: string): void {
        let parsed: URL;
        try {
            parsed = new URL(url);
        } catch {
            throw new URLValidationError(`Invalid URL format: ${url}`);
        }
        if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
            throw new URLValidationError(`Invalid URL scheme: ${parsed.protocol.replace(/:$/, '')}`);
        }
        if (!parsed.host) {
            throw new URLValidationError('Invalid URL format: Missing domain');
        }
    }

    /**
     * Keep digits only. A value with no digits at all is returned unchanged.
     */
    static cleanPhoneNumber(phone: string): string {
        const cleaned = phone.replace(/\D/g, '');
        return cleaned || phone;
    }

    static fromJSON(data: AdRecordData): AdRecord {
        return new AdRecord(data);
    }

    isValid(): boolean {
        return Boolean(this.websiteUrl && this.title && this.keyword && this.location);
    }

    toJSON(): AdRecordJSON {
        return {
            keyword: this.keyword,
            location: this.location,
            website_url: this.websiteUrl,
            title: this.title,
            description: this.description,
            phone_number: this.phoneNumber,
            price: this.price,
            email: this.email,
            social_links: { ...this.socialLinks },
            meta_tags: { ...this.metaTags },
            ad_position: this.position,
            timestamp: this.timestamp
        };
    }

    toString(): string {
        return `${this.title} - ${this.websiteUrl} (${this.position})`;
    }
}
