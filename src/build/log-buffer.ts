/**
 * Ordered, append-only record of subprocess output for one build.
 */
export class LogBuffer {
    private readonly entries: string[] = [];

    append(line: string): void {
        this.entries.push(line);
    }

    get lines(): readonly string[] {
        return this.entries;
    }

    get size(): number {
        return this.entries.length;
    }

    text(): string {
        return this.entries.join('\n');
    }
}
