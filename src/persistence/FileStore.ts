import { mkdir, readFile, rename, stat, writeFile } from "node:fs/promises"
import { dirname, join } from "node:path"

import { errorMessage } from "../core/errors.js"
import { log } from "../core/Logger.js"

export function isErrnoException(
    error: unknown
): error is NodeJS.ErrnoException {
    return error instanceof Error && "code" in error
}

/** JSON documents keyed by relative path, written via temp file + rename. */
export class FileStore {
    public readonly basePath: string

    constructor(basePath: string) {
        this.basePath = basePath
    }

    public async write(key: string, data: unknown): Promise<void> {
        const filePath = this.pathFor(key)
        const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`
        const content = JSON.stringify(data, null, 2)

        try {
            await mkdir(dirname(filePath), { recursive: true })
            await writeFile(tempPath, content, "utf-8")
            await rename(tempPath, filePath)
        } catch (error) {
            log.persistence("Failed to write %s: %s", key, errorMessage(error))
            throw error
        }
    }

    /** Parsed document, or null when the file does not exist. */
    public async read(key: string): Promise<unknown> {
        const filePath = this.pathFor(key)
        let content: string
        try {
            content = await readFile(filePath, "utf-8")
        } catch (error) {
            if (isErrnoException(error) && error.code === "ENOENT") {
                return null
            }
            log.persistence("Failed to read %s: %s", key, errorMessage(error))
            throw error
        }
        const parsed: unknown = JSON.parse(content)
        return parsed
    }

    public async exists(key: string): Promise<boolean> {
        try {
            await stat(this.pathFor(key))
            return true
        } catch {
            return false
        }
    }

    public pathFor(key: string): string {
        return join(this.basePath, `${key}.json`)
    }
}
