import fs from 'fs/promises';
import path from 'path';

export interface SqlFile {
    name: string;
    content: string;
}

const SQL_FILE_NAME = /^[\w.-]+\.sql$/;

export const isSqlFileName = (name: string): boolean => SQL_FILE_NAME.test(name) && !name.startsWith('.');

/**
 * Reads `.sql` files from a single directory. Names are plain file names;
 * anything that could leave the directory is treated as not found.
 */
export class SqlFileService {
    constructor(private sqlDir: string) { }

    get directory(): string {
        return this.sqlDir;
    }

    async listSqlFiles(): Promise<string[]> {
        const entries = await fs.readdir(this.sqlDir, { withFileTypes: true });
        return entries
            .filter(entry => entry.isFile() && isSqlFileName(entry.name))
            .map(entry => entry.name)
            .sort();
    }

    async readSqlFile(name: string): Promise<SqlFile | null> {
        if (!isSqlFileName(name)) {
            return null;
        }

        try {
            const content = await fs.readFile(path.join(this.sqlDir, name), 'utf-8');
            return { name, content };
        } catch (error) {
            if (isMissingFile(error)) {
                return null;
            }
            throw error;
        }
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR');
}
