import { join, resolve } from 'path';

export interface ProcessDirectory {
    cwd(): string;
    chdir(directory: string): void;
}

/**
 * Handle on the process working directory. Remembers where the run started so
 * `restore()` can put it back, whatever happened in between.
 */
export class WorkingDirectory {
    readonly origin: string;
    private current: string;
    private proc: ProcessDirectory;

    constructor(proc: ProcessDirectory = process) {
        this.proc = proc;
        this.origin = proc.cwd();
        this.current = this.origin;
    }

    get path(): string {
        return this.current;
    }

    resolve(...segments: string[]): string {
        return join(this.current, ...segments);
    }

    enter(directory: string): void {
        const target = resolve(this.current, directory);
        this.proc.chdir(target);
        this.current = target;
    }

    restore(): void {
        if (this.proc.cwd() !== this.origin) {
            this.proc.chdir(this.origin);
        }
        this.current = this.origin;
    }
}
