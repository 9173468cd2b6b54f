// progress.ts — per-module completion lines

export interface ProgressReporter {
    advance(module: string, ok: boolean): void;
    finish(): void;
}

export interface ProgressStream {
    write(chunk: string): boolean;
    isTTY?: boolean;
}

export class ProgressBar implements ProgressReporter {
    private done = 0;
    private lastWidth = 0;

    constructor(
        private readonly total: number,
        private readonly stream: ProgressStream = process.stderr,
        private readonly label = 'build',
    ) {}

    advance(module: string, ok: boolean): void {
        this.done++;
        const line = `[${this.done}/${this.total}] ${this.label} ${ok ? 'ok  ' : 'FAIL'} ${module}`;
        if (this.stream.isTTY) {
            const pad = Math.max(0, this.lastWidth - line.length);
            this.stream.write(`\r${line}${' '.repeat(pad)}`);
            this.lastWidth = line.length;
        } else {
            this.stream.write(line + '\n');
        }
    }

    finish(): void {
        if (this.stream.isTTY && this.lastWidth > 0) this.stream.write('\n');
        this.lastWidth = 0;
    }
}
