import fs from 'fs';
import path from 'path';
import { createObjectCsvWriter } from 'csv-writer';
import { AdRecord } from '../ad-record';

export const CSV_HEADER = [
    { id: 'keyword', title: 'keyword' },
    { id: 'location', title: 'location' },
    { id: 'ad_position', title: 'ad_position' },
    { id: 'title', title: 'title' },
    { id: 'website_url', title: 'website_url' },
    { id: 'description', title: 'description' },
    { id: 'phone_number', title: 'phone_number' },
    { id: 'email', title: 'email' },
    { id: 'price', title: 'price' },
    { id: 'social_links', title: 'social_links' },
    { id: 'meta_tags', title: 'meta_tags' },
    { id: 'timestamp', title: 'timestamp' }
];

export type CsvRow = Record<string, string>;

/**
 * Flatten a record for CSV: nulls become empty cells, maps become JSON.
 */
export const toCsvRow = (record: AdRecord): CsvRow => {
    const json = record.toJSON();
    return {
        keyword: json.keyword,
        location: json.location,
        ad_position: json.ad_position,
        title: json.title,
        website_url: json.website_url,
        description: json.description ?? '',
        phone_number: json.phone_number ?? '',
        email: json.email ?? '',
        price: json.price ?? '',
        social_links: JSON.stringify(json.social_links),
        meta_tags: JSON.stringify(json.meta_tags),
        timestamp: json.timestamp
    };
};

export const exportFilename = (date: Date = new Date()): string =>
    `ads_${date.toISOString().replace(/[:.]/g, '-')}.csv`;

export class AdExporter {
    constructor(private readonly outputDir: string) {}

    /**
     * Write all records to a new timestamped CSV and return its path.
     */
    async write(records: AdRecord[], date: Date = new Date()): Promise<string> {
        fs.mkdirSync(this.outputDir, { recursive: true });
        const filePath = path.join(this.outputDir, exportFilename(date));

        const writer = createObjectCsvWriter({ path: filePath, header: CSV_HEADER });
        await writer.writeRecords(records.map(toCsvRow));

        return filePath;
    }
}
