import { describe, it, expect } from 'vitest';
import { join } from 'path';
import { WorkingDirectory } from './working-directory.js';
import { FakeProcess } from '../test-support/fakes.js';

describe('WorkingDirectory', () => {
    const start = join('/', 'work', 'sites');

    it('should enter a directory relative to the current one', () => {
        const proc = new FakeProcess(start);
        const cwd = new WorkingDirectory(proc);

        cwd.enter('blog');

        expect(cwd.path).toBe(join(start, 'blog'));
        expect(proc.cwd()).toBe(join(start, 'blog'));
        expect(cwd.resolve('hugo.yaml')).toBe(join(start, 'blog', 'hugo.yaml'));
    });

    it('should return to the original directory on restore', () => {
        const proc = new FakeProcess(start);
        const cwd = new WorkingDirectory(proc);

        cwd.enter('blog');
        cwd.restore();

        expect(proc.cwd()).toBe(start);
        expect(cwd.path).toBe(start);
        expect(proc.visited).toEqual([join(start, 'blog'), start]);
    });

    it('should not change directory when nothing moved', () => {
        const proc = new FakeProcess(start);
        const cwd = new WorkingDirectory(proc);

        cwd.restore();

        expect(proc.visited).toEqual([]);
    });
});
