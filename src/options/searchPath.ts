import * as fs from 'fs';
import * as path from 'path';
import { Location } from 'vscode-languageserver/node';

import { DirectoryCache } from './dirCache';
import { ErrorReporter, commandLineLocation } from './diagnostics';
import { LogFunction } from './types';
import { cleanupFilename, filenameIsRel, filenameJoin } from './utils';

// Ordered directories with constant-time membership; order is search order
export class DirectoryList {
    private readonly order: string[] = [];
    private readonly members = new Set<string>();

    add(dir: string): boolean {
        if (this.members.has(dir)) return false;
        this.members.add(dir);
        this.order.push(dir);
        return true;
    }

    remove(dir: string): boolean {
        if (!this.members.delete(dir)) return false;
        this.order.splice(this.order.indexOf(dir), 1);
        return true;
    }

    has(dir: string): boolean {
        return this.members.has(dir);
    }

    get items(): readonly string[] {
        return this.order;
    }

    get size(): number {
        return this.order.length;
    }
}

export interface SearchPathSettings {
    // Whether the including file's directory is searched last
    relativeIncludes?: () => boolean;
    maxModuleNameLength?: number;
    cache?: DirectoryCache;
    log?: LogFunction;
}

/**
 * Resolves module names to source files.
 *
 * Search order: the name itself when absolute, user include directories,
 * fallback include directories, then (with relative includes enabled) the
 * directory of the file that referenced the module. In each directory every
 * library extension is tried in registration order.
 */
export class SearchPath {
    private readonly users = new DirectoryList();
    private readonly fallbacks = new DirectoryList();
    private readonly libExts: string[] = [];
    private readonly libExtSet = new Set<string>();
    private readonly cache: DirectoryCache;
    private readonly relativeIncludes: () => boolean;
    private readonly maxModuleNameLength: number;
    private notFoundHintShown = false;

    constructor(private readonly reporter: ErrorReporter, settings: SearchPathSettings = {}) {
        this.cache = settings.cache ?? new DirectoryCache(undefined, settings.log);
        this.relativeIncludes = settings.relativeIncludes ?? (() => false);
        this.maxModuleNameLength = settings.maxModuleNameLength ?? 127;
    }

    // User directories take priority: adding one removes it from the fallbacks
    addIncDirUser(incdir: string): void {
        const dir = cleanupFilename(incdir);
        if (this.users.add(dir)) {
            this.fallbacks.remove(dir);
        }
    }

    addIncDirFallback(incdir: string): void {
        const dir = cleanupFilename(incdir);
        if (!this.users.has(dir)) {
            this.fallbacks.add(dir);
        }
    }

    addLibExt(libext: string): void {
        if (this.libExtSet.has(libext)) return;
        this.libExtSet.add(libext);
        this.libExts.push(libext);
    }

    get userDirs(): readonly string[] {
        return this.users.items;
    }

    get fallbackDirs(): readonly string[] {
        return this.fallbacks.items;
    }

    get libraryExtensions(): readonly string[] {
        return this.libExts;
    }

    // Return filename if it names an existing regular file, else null
    fileExists(filename: string): string | null {
        const dir = path.dirname(filename);
        const base = path.basename(filename);
        if (!this.cache.has(dir, base)) return null;

        const found = filenameJoin(dir, base);
        try {
            // Directories with a matching name are not sources
            if (!fs.statSync(found, { throwIfNoEntry: false })?.isFile()) return null;
        } catch {
            return null;
        }
        return found;
    }

    private checkOneDir(modname: string, dir: string, tried: string[]): string | null {
        for (const ext of this.libExts) {
            const candidate = filenameJoin(dir, modname + ext);
            tried.push(candidate);
            const exists = this.fileExists(candidate);
            if (exists !== null) return exists;
        }
        return null;
    }

    /**
     * Find the file holding moduleName. With a non-empty errorPrefix a miss is
     * reported at location, listing every path that was tried; otherwise the
     * miss is silent.
     */
    resolve(
        moduleName: string,
        lastPath: string,
        errorPrefix = '',
        location: Location = commandLineLocation()
    ): string | null {
        const filename = cleanupFilename(moduleName);
        const tried: string[] = [];

        if (!filenameIsRel(filename)) {
            const exists = this.checkOneDir(filename, '', tried);
            if (exists !== null) return exists;
        }
        for (const dir of this.users.items) {
            const exists = this.checkOneDir(filename, dir, tried);
            if (exists !== null) return exists;
        }
        for (const dir of this.fallbacks.items) {
            const exists = this.checkOneDir(filename, dir, tried);
            if (exists !== null) return exists;
        }
        if (this.relativeIncludes()) {
            const exists = this.checkOneDir(filename, lastPath, tried);
            if (exists !== null) return realPath(exists);
        }

        if (errorPrefix !== '') {
            this.reporter.error(location, `${errorPrefix}'${filename}'${this.lookedInMessage(filename, tried)}`);
        }
        return null;
    }

    private lookedInMessage(modname: string, tried: readonly string[]): string {
        if (modname.length > this.maxModuleNameLength) {
            return `\n... Note: Name is longer than ${this.maxModuleNameLength} characters; automatic`
                + ' file lookup may have failed due to OS filename length limits.'
                + '\n... Suggest putting filename with this module/package onto command line instead.';
        }
        let message = '';
        if (!this.notFoundHintShown && this.users.size === 0) {
            this.notFoundHintShown = true;
            message += "\n... This may be because there's no search path specified with -I<dir>.";
        }
        message += '\n... Looked in:';
        for (const candidate of tried) {
            message += `\n...      ${candidate}`;
        }
        return message;
    }
}

function realPath(filename: string): string {
    try {
        return fs.realpathSync(filename);
    } catch {
        return filename;
    }
}
