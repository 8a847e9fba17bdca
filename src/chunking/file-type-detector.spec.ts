import { ChunkingStrategy } from "./chunking.strategy";
import { FileTypeDetector } from "./file-type-detector";

function fakeStrategy(name: string, supportedExtensions: string[]): ChunkingStrategy {
    return { name, supportedExtensions, chunk: jest.fn().mockResolvedValue([]) };
}

describe('FileTypeDetector', () => {
    const text = fakeStrategy('recursive_character', ['.txt']);
    const markdown = fakeStrategy('markdown', ['.md', '.markdown']);
    const detector = new FileTypeDetector(text, [markdown]);

    it('routes by extension', () => {
        expect(detector.resolve('/docs/readme.md')).toBe(markdown);
        expect(detector.resolve('/docs/notes.txt')).toBe(text);
    });

    it('ignores extension case', () => {
        expect(detector.resolve('/docs/README.MARKDOWN')).toBe(markdown);
    });

    it('falls back to the default strategy', () => {
        expect(detector.resolve('/docs/data.csv')).toBe(text);
        expect(detector.resolve('/docs/Makefile')).toBe(text);
    });

    it('lets later registrations take over an extension', () => {
        const local = new FileTypeDetector(text, [markdown]);
        const rst = fakeStrategy('restructured', ['.txt']);

        local.register(rst);

        expect(local.resolve('a.txt')).toBe(rst);
    });
});
