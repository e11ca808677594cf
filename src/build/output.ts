import pc from 'picocolors';

export interface OutputSink {
    out(line: string): void;
    err(line: string): void;
}

const consoleSink: OutputSink = {
    out: (line) => console.log(line),
    err: (line) => console.error(line)
};

export type Palette = ReturnType<typeof pc.createColors>;

const INDENT = '       ';

/**
 * Operator-facing build output.
 * Headers start with an arrow, body lines are indented under them,
 * warnings and errors go to stderr as a marked block.
 */
export class Output {
    constructor(
        private readonly sink: OutputSink = consoleSink,
        private readonly colors: Palette = pc
    ) {}

    header(title: string): void {
        this.sink.out('');
        this.sink.out(this.colors.bold(`-----> ${title}`));
    }

    info(text: string): void {
        for (const line of text.split('\n')) {
            this.sink.out(`${INDENT}${line}`);
        }
    }

    warn(title: string, body?: string): void {
        this.block(this.colors.yellow, `Warning: ${title}`, body);
    }

    error(title: string, body?: string): void {
        this.block(this.colors.red, title, body);
    }

    private block(paint: (text: string) => string, title: string, body?: string): void {
        this.sink.err('');
        this.sink.err(paint(`!     ${title}`));
        if (body) {
            for (const line of body.split('\n')) {
                this.sink.err(paint(`!     ${line}`));
            }
        }
    }
}
