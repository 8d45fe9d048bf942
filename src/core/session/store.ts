import * as fs from 'fs'
import * as path from 'path'
import { getLogger, Logger } from '../../log/utils'
import {
    RESOURCES_SUMMARY_FILENAME,
    SESSION_ID_PREFIX,
    SSH_PRIVATE_KEY_FILENAME,
    SSH_PUBLIC_KEY_FILENAME
} from '../const'
import { SessionNotFoundError } from '../errors/provisioning'
import { ProvisionedResources } from '../state/resources'
import {
    parseSnapshot,
    type ParsedSnapshot,
    recoverResources,
    renderSnapshot,
    type SessionStage,
    STAGE_FILE_PATTERN,
    stageFileName,
    type StageSnapshot
} from './snapshot'

/**
 * One provisioning run and its persistence area.
 */
export interface Session {
    readonly id: string
    readonly dir: string
    readonly createdAt: Date
}

/**
 * A session found on disk, with the stage files it holds (sorted).
 */
export interface SessionHandle {
    readonly id: string
    readonly dir: string
    readonly stageFiles: string[]
}

export interface SessionStoreArgs {
    rootDir: string
    /** Clock used for session IDs and snapshot timestamps */
    now?: () => Date
}

function pad(n: number): string {
    return n.toString().padStart(2, '0')
}

export function formatSessionId(date: Date): string {
    return `${SESSION_ID_PREFIX}${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
        `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error
}

/**
 * Directory-backed session storage: one directory per session under rootDir,
 * one file per completed stage.
 *
 * Writes made during provisioning (stages, summary) never throw: a failed write
 * is logged and reported through the return value, provisioning goes on.
 */
export class SessionStore {

    private readonly logger: Logger
    private readonly rootDir: string
    private readonly now: () => Date

    constructor(args: SessionStoreArgs) {
        this.logger = getLogger(SessionStore.name)
        this.rootDir = args.rootDir
        this.now = args.now ?? (() => new Date())
    }

    getRootDir(): string {
        return this.rootDir
    }

    /**
     * Allocate a new session with a time-derived ID. If a session with the same
     * ID already exists (two runs within the same second), a numeric suffix is added.
     */
    async createSession(): Promise<Session> {
        await fs.promises.mkdir(this.rootDir, { recursive: true, mode: 0o700 })

        const createdAt = this.now()
        const baseId = formatSessionId(createdAt)

        for (let attempt = 1; ; attempt++) {
            const id = attempt === 1 ? baseId : `${baseId}_${attempt}`
            const dir = path.join(this.rootDir, id)
            try {
                await fs.promises.mkdir(dir, { mode: 0o700 })
                this.logger.info(`Session directory created: ${dir}`)
                return { id, dir, createdAt }
            } catch (error) {
                if (isErrnoException(error) && error.code === 'EEXIST') {
                    continue
                }
                throw error
            }
        }
    }

    /**
     * Write a stage file. Never overwrites an existing stage file.
     *
     * @returns true if the file was written
     */
    async recordStage(session: Session, stage: SessionStage, snapshot: StageSnapshot): Promise<boolean> {
        const filePath = path.join(session.dir, stageFileName(stage))
        const content = renderSnapshot(stage, snapshot, this.now())
        try {
            await fs.promises.writeFile(filePath, content, { flag: 'wx', mode: 0o600 })
            this.logger.debug(`Session stage saved: ${filePath}`)
            return true
        } catch (error) {
            if (isErrnoException(error) && error.code === 'EEXIST') {
                this.logger.warn(`Stage ${stage} already recorded for session ${session.id}, keeping existing file`)
            } else {
                this.logger.warn(`Failed to save stage ${stage} for session ${session.id}`, { error: String(error) })
            }
            return false
        }
    }

    /**
     * Write the final resource summary as JSON (replaced on each call).
     */
    async writeSummary(session: Session, resources: ProvisionedResources): Promise<boolean> {
        const filePath = path.join(session.dir, RESOURCES_SUMMARY_FILENAME)
        try {
            await fs.promises.writeFile(filePath, JSON.stringify(resources, null, 2) + '\n', { mode: 0o600 })
            return true
        } catch (error) {
            this.logger.warn(`Failed to save resource summary for session ${session.id}`, { error: String(error) })
            return false
        }
    }

    async loadSessions(): Promise<SessionHandle[]> {
        let entries: fs.Dirent[]
        try {
            entries = await fs.promises.readdir(this.rootDir, { withFileTypes: true })
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return []
            }
            throw error
        }

        const ids = entries
            .filter(e => e.isDirectory() && e.name.startsWith(SESSION_ID_PREFIX))
            .map(e => e.name)
            .sort()

        const handles: SessionHandle[] = []
        for (const id of ids) {
            handles.push(await this.toHandle(id))
        }
        return handles
    }

    /**
     * Open an existing session. Accepts a full ID or the bare timestamp part.
     */
    async openSession(sessionId: string): Promise<SessionHandle> {
        const id = sessionId.startsWith(SESSION_ID_PREFIX) ? sessionId : `${SESSION_ID_PREFIX}${sessionId}`
        const dir = path.join(this.rootDir, id)
        try {
            const stat = await fs.promises.stat(dir)
            if (!stat.isDirectory()) {
                throw new SessionNotFoundError({ sessionId: id, rootDir: this.rootDir })
            }
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                throw new SessionNotFoundError({ sessionId: id, rootDir: this.rootDir })
            }
            throw error
        }
        return this.toHandle(id)
    }

    /**
     * Rebuild the resource record of a session from its stage files.
     */
    async readResources(handle: SessionHandle, defaultRegion: string): Promise<ProvisionedResources> {
        const snapshots: ParsedSnapshot[] = []
        for (const file of handle.stageFiles) {
            const text = await fs.promises.readFile(path.join(handle.dir, file), 'utf-8')
            snapshots.push(parseSnapshot(text))
        }
        return recoverResources(snapshots, defaultRegion)
    }

    /**
     * Delete a session directory, or only its key pair when keepLogs is set.
     */
    async deleteSession(handle: SessionHandle, opts: { keepLogs: boolean }): Promise<void> {
        if (opts.keepLogs) {
            for (const file of [SSH_PRIVATE_KEY_FILENAME, SSH_PUBLIC_KEY_FILENAME]) {
                await fs.promises.rm(path.join(handle.dir, file), { force: true })
            }
            this.logger.info(`Deleted key pair of session ${handle.id}, logs kept in ${handle.dir}`)
            return
        }
        await fs.promises.rm(handle.dir, { recursive: true, force: true })
        this.logger.info(`Deleted session directory ${handle.dir}`)
    }

    private async toHandle(id: string): Promise<SessionHandle> {
        const dir = path.join(this.rootDir, id)
        const files = await fs.promises.readdir(dir)
        return {
            id,
            dir,
            stageFiles: files.filter(f => STAGE_FILE_PATTERN.test(f)).sort()
        }
    }
}
