import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { AcquisitionError } from "../errors";
import { createLogger } from "../logging/logger";
import { OuiRegistry, parseOuiText } from "./registry";

const log = createLogger("oui", "source");

export const IEEE_OUI_URL = "https://standards-oui.ieee.org/oui/oui.txt";

export interface OuiSource {
    /** @throws AcquisitionError */
    load(): Promise<OuiRegistry>;
}

export type FetchLike = (url: string) => Promise<{
    ok: boolean;
    status: number;
    statusText: string;
    text(): Promise<string>;
}>;

function toRegistry(text: string, origin: string): OuiRegistry {
    let registry = parseOuiText(text);
    if (registry.size == 0) {
        throw new AcquisitionError("registry", `no OUI assignments found in ${origin}`);
    }
    log.debug("registry loaded", { origin, size: registry.size });
    return registry;
}

export class FileOuiSource implements OuiSource {
    constructor(readonly filePath: string) { }

    async load(): Promise<OuiRegistry> {
        let text: string;
        try {
            text = await readFile(this.filePath, "utf-8");
        } catch (error) {
            throw new AcquisitionError("registry", `cannot read vendor registry ${this.filePath}`, error);
        }
        return toRegistry(text, this.filePath);
    }
}

export class HttpOuiSource implements OuiSource {
    constructor(
        readonly url: string = IEEE_OUI_URL,
        private readonly fetchText: FetchLike = fetch,
    ) { }

    async download(): Promise<string> {
        log.info("downloading vendor registry", { url: this.url });

        let response: Awaited<ReturnType<FetchLike>>;
        try {
            response = await this.fetchText(this.url);
        } catch (error) {
            throw new AcquisitionError("registry", `cannot download vendor registry from ${this.url}`, error);
        }

        if (!response.ok) {
            throw new AcquisitionError("registry", `cannot download vendor registry from ${this.url}: HTTP ${response.status} ${response.statusText}`.trim());
        }

        try {
            return await response.text();
        } catch (error) {
            throw new AcquisitionError("registry", `cannot read vendor registry body from ${this.url}`, error);
        }
    }

    async load(): Promise<OuiRegistry> {
        return toRegistry(await this.download(), this.url);
    }
}

export type CachedOuiSourceOptions = {
    filePath: string;
    url?: string;
    /** download even when the cache file exists */
    refresh?: boolean;
    fetch?: FetchLike;
};

/** Local copy of the registry, downloaded on first use. */
export class CachedOuiSource implements OuiSource {
    private readonly file: FileOuiSource;
    private readonly http: HttpOuiSource;
    private readonly refresh: boolean;

    constructor(options: CachedOuiSourceOptions) {
        this.file = new FileOuiSource(options.filePath);
        this.http = new HttpOuiSource(options.url, options.fetch);
        this.refresh = options.refresh ?? false;
    }

    async load(): Promise<OuiRegistry> {
        let cached = await access(this.file.filePath).then(() => true, () => false);
        if (cached && !this.refresh) {
            return this.file.load();
        }

        let text = await this.http.download();
        let registry = toRegistry(text, this.http.url);

        try {
            await mkdir(path.dirname(this.file.filePath), { recursive: true });
            await writeFile(this.file.filePath, text, "utf-8");
            log.debug("vendor registry cached", { path: this.file.filePath });
        } catch (error) {
            throw new AcquisitionError("registry", `cannot write vendor registry cache ${this.file.filePath}`, error);
        }

        return registry;
    }
}
