import { mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";

/**
 * Where generated report files go
 *
 * A reference returned by `save` is what `read` accepts back.
 */
export interface ArtifactStore {
    save(name: string, content: string): Promise<string>;
    read(ref: string): Promise<string | undefined>;
}

/**
 * Artifacts as plain files in one output directory
 */
export class FileArtifactStore implements ArtifactStore {
    constructor(private readonly directory: string) { }

    async save(name: string, content: string): Promise<string> {
        await mkdir(this.directory, { recursive: true });
        await writeFile(join(this.directory, basename(name)), content, 'utf8');
        return basename(name);
    }

    async read(ref: string): Promise<string | undefined> {
        // References are bare file names; anything with a path component is unknown
        if (basename(ref) !== ref) return undefined;
        try {
            return await readFile(join(this.directory, ref), 'utf8');
        } catch (err) {
            if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
            throw err;
        }
    }
}
