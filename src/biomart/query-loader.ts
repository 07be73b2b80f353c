import { promises as fs } from 'fs';
import path from 'path';
import { config } from '../config/index.js';

/**
 * Read a BioMart XML query template and flatten it to a single line so it
 * can travel as one request parameter. A missing template rejects with ENOENT.
 */
export async function loadQuery(templateName: string, queryDir: string = config.biomart.queryDir): Promise<string> {
    const xml = await fs.readFile(path.join(queryDir, templateName), 'utf8');
    return xml.replace(/\r?\n/g, '');
}
