import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileReadError, FileWriteError } from '../errors';
import { TextFileRepository } from './text-file.repository';

describe('TextFileRepository', () => {
    const repo = new TextFileRepository();
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'serial-masker-repo-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    describe('read', () => {
        it('should read an empty file as UTF-8 text', async () => {
            const path = join(dir, 'empty.txt');
            await writeFile(path, '');
            await expect(repo.read(path)).resolves.toEqual({ text: '', encoding: 'UTF-8' });
        });

        it('should detect the encoding of a text file', async () => {
            const path = join(dir, 'device.conf');
            await writeFile(path, 'hostname core-sw1\nserial AB1234-XYZ9\n');
            const contents = await repo.read(path);
            expect(contents.text).toBe('hostname core-sw1\nserial AB1234-XYZ9\n');
            expect(contents.encoding.length).toBeGreaterThan(0);
        });

        it('should decode with a forced encoding', async () => {
            const path = join(dir, 'latin1.txt');
            await writeFile(path, Buffer.from([0x63, 0x61, 0x66, 0xe9]));
            await expect(repo.read(path, 'latin1')).resolves.toEqual({ text: 'café', encoding: 'latin1' });
        });

        it('should raise FileReadError for a missing file', async () => {
            const path = join(dir, 'missing.txt');
            const read = repo.read(path);
            await expect(read).rejects.toBeInstanceOf(FileReadError);
            await expect(read).rejects.toMatchObject({
                code: 'FILE_READ',
                path,
                message: `Input file not found: ${path}`,
            });
        });

        it('should raise FileReadError when the path is a directory', async () => {
            await expect(repo.read(dir)).rejects.toMatchObject({ code: 'FILE_READ', path: dir });
        });

        it('should raise FileReadError when the bytes do not decode losslessly', async () => {
            const path = join(dir, 'broken.txt');
            await writeFile(path, Buffer.from([0x61, 0x0a, 0xff, 0xfe, 0x41]));
            const read = repo.read(path, 'utf-8');
            await expect(read).rejects.toBeInstanceOf(FileReadError);
            await expect(read).rejects.toMatchObject({
                code: 'FILE_READ',
                path,
                message: `Error decoding file ${path} with encoding utf-8`,
            });
        });

        it('should raise FileReadError for an unsupported forced encoding', async () => {
            const path = join(dir, 'plain.txt');
            await writeFile(path, 'text');
            await expect(repo.read(path, 'no-such-charset')).rejects.toMatchObject({
                code: 'FILE_READ',
                message: `Unsupported encoding no-such-charset for file: ${path}`,
            });
        });
    });

    describe('write', () => {
        it('should encode the text with the given encoding', async () => {
            const path = join(dir, 'out.txt');
            await repo.write(path, { text: 'café', encoding: 'latin1' });
            expect([...(await readFile(path))]).toEqual([0x63, 0x61, 0x66, 0xe9]);
        });

        it('should replace existing contents', async () => {
            const path = join(dir, 'out.txt');
            await writeFile(path, 'previous contents that are longer');
            await repo.write(path, { text: 'new', encoding: 'utf8' });
            await expect(readFile(path, 'utf8')).resolves.toBe('new');
        });

        it('should raise FileWriteError when the directory does not exist', async () => {
            const path = join(dir, 'missing', 'out.txt');
            const write = repo.write(path, { text: 'x', encoding: 'utf8' });
            await expect(write).rejects.toBeInstanceOf(FileWriteError);
            await expect(write).rejects.toMatchObject({ code: 'FILE_WRITE', path });
        });
    });
});
