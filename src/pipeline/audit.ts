import fs from 'fs-extra';
import path from 'path';
import { errorMessage, warn } from './log';
import type { AudioPayload } from './types';

/**
 * Where chunk audio and raw collaborator replies go for post-hoc auditing.
 * Implementations must not throw: auditing never fails a job.
 */
export interface AuditSink {
    saveAudio(name: string, audio: AudioPayload): Promise<void>;
    saveReply(name: string, text: string): Promise<void>;
    saveError(name: string, message: string): Promise<void>;
}

const EXT_BY_MIME: Record<string, string> = {
    'audio/wav': 'wav',
    'audio/x-wav': 'wav',
    'audio/mpeg': 'mp3',
    'audio/mp3': 'mp3',
};

/**
 * Writes audit files into one job directory, e.g. `chunk_0003.wav`,
 * `chunk_0003_response.json`, `gap_0001_error.txt`.
 */
export class ArtifactAudit implements AuditSink {
    constructor(readonly dir: string, private readonly opts: { audio: boolean } = { audio: true }) {}

    private async write(file: string, data: string | Buffer) {
        try {
            await fs.ensureDir(this.dir);
            await fs.writeFile(path.join(this.dir, file), data);
        } catch (e) {
            warn('audit.write.fail', { file, error: errorMessage(e) });
        }
    }

    async saveAudio(name: string, audio: AudioPayload): Promise<void> {
        if (!this.opts.audio) return;
        await this.write(`${name}.${EXT_BY_MIME[audio.mimeType] ?? 'bin'}`, audio.data);
    }

    async saveReply(name: string, text: string): Promise<void> {
        await this.write(`${name}_response.json`, JSON.stringify({ text }, null, 2));
    }

    async saveError(name: string, message: string): Promise<void> {
        await this.write(`${name}_error.txt`, message);
    }
}
