import * as fs from 'fs';

import { LogFunction } from './types';

export type ReadDirFunction = (dir: string) => string[];

function readDirNames(dir: string): string[] {
    return fs.readdirSync(dir);
}

// One listing per directory for the life of the cache. Files created or
// removed after the first listing are not observed.
export class DirectoryCache {
    private readonly listings = new Map<string, Set<string>>();
    private listCount = 0;

    constructor(
        private readonly readDir: ReadDirFunction = readDirNames,
        private readonly log?: LogFunction
    ) {}

    // Whether name is an entry of dir ("." for the current directory)
    has(dir: string, name: string): boolean {
        return this.entries(dir).has(name);
    }

    entries(dir: string): ReadonlySet<string> {
        let names = this.listings.get(dir);
        if (!names) {
            names = new Set();
            // Cached before reading so an unreadable directory is only tried once
            this.listings.set(dir, names);
            this.listCount++;
            try {
                for (const name of this.readDir(dir)) names.add(name);
            } catch (e) {
                this.log?.(`Failed to list directory '${dir}': ${e}`);
            }
        }
        return names;
    }

    // Number of real directory listings performed
    get listingCount(): number {
        return this.listCount;
    }
}
