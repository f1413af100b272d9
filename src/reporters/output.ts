/**
 * Report output helpers
 */

import * as fs from 'fs';
import * as path from 'path';

/**
 * Write UTF-8 content, creating parent directories. Returns the absolute path written.
 */
export function writeOutput(filePath: string, content: string): string {
    const absolutePath = path.resolve(filePath);
    const outputDir = path.dirname(absolutePath);

    if (!fs.existsSync(outputDir)) {
        fs.mkdirSync(outputDir, { recursive: true });
    }

    fs.writeFileSync(absolutePath, content, 'utf-8');
    return absolutePath;
}
