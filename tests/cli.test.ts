import {existsSync, mkdirSync, writeFileSync} from 'fs';
import {join} from 'path';
import {
  createProgram,
  parseExtensions,
  resolveDirectory,
  runComparison,
  runScan
} from '../src/cli';
import {RepairError} from '../src/errors';
import {makeTmpDir, removeTmpDir} from './tmp-dir';

describe('CLI', () => {
  let root: string;

  beforeEach(() => {
    root = makeTmpDir();
  });

  afterEach(() => {
    removeTmpDir(root);
  });

  describe('resolveDirectory', () => {
    it('Should return the absolute directory path', () => {
      expect(resolveDirectory(root)).toBe(root);
    });

    it('Should reject a missing path', () => {
      expect.assertions(2);
      try {
        resolveDirectory(join(root, 'missing'));
      } catch (e) {
        expect(e).toBeInstanceOf(RepairError);
        expect(e).toMatchObject({code: 'PATH_NOT_FOUND'});
      }
    });

    it('Should reject a file', () => {
      const file = join(root, 'file.txt');
      writeFileSync(file, '');

      expect(() => resolveDirectory(file)).toThrow(RepairError);
      expect(() => resolveDirectory(file)).toThrow(`'${file}' is not a directory!`);
    });
  });

  it('Should parse extension lists', () => {
    expect(parseExtensions('txt, .MD,,')).toEqual(['.txt', '.md']);
  });

  it('Should scan a directory without touching folder names', () => {
    mkdirSync(join(root, '#U6d4b'));
    writeFileSync(join(root, '#U8bd5.txt'), '');

    const summary = runScan(root, {fixFolders: false, fixContent: false});

    expect(summary.namesFixed.map(record => record.newPath)).toEqual([
      join(root, '试.txt')
    ]);
  });

  it('Should produce a comparison report', () => {
    mkdirSync(join(root, 'old'));
    mkdirSync(join(root, 'new'));

    const report = runComparison(join(root, 'old'), join(root, 'new'));

    expect(report.split('\n')[0]).toBe('File comparison report');
  });

  it('Should register the commands', () => {
    const program = createProgram();

    expect(program.commands.map(command => command.name())).toEqual([
      'fix',
      'fix-names',
      'compare'
    ]);
  });

  describe('exit status', () => {
    beforeEach(() => {
      process.exitCode = undefined;
      jest.spyOn(console, 'log').mockImplementation(() => undefined);
      jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
      process.exitCode = undefined;
      jest.restoreAllMocks();
    });

    it('Should exit with 1 for a missing path', () => {
      const missing = join(root, 'missing');

      createProgram().parse(['node', 'encoding-repair', 'fix', missing]);

      expect(process.exitCode).toBe(1);
      expect(console.error).toHaveBeenCalledWith(
        `Error: Path '${missing}' does not exist!`
      );
    });

    it('Should exit with 1 when the path is a file', () => {
      const file = join(root, 'file.txt');
      writeFileSync(file, '');

      createProgram().parse(['node', 'encoding-repair', 'fix-names', file]);

      expect(process.exitCode).toBe(1);
    });

    it('Should leave the exit status unset after a successful scan', () => {
      writeFileSync(join(root, '#U6d4b.txt'), '');

      createProgram().parse(['node', 'encoding-repair', 'fix', root]);

      expect(process.exitCode).toBeUndefined();
      expect(existsSync(join(root, '测.txt'))).toBe(true);
    });

    it('Should pass --no-folders through to the scanner', () => {
      mkdirSync(join(root, '#U6d4b'));
      writeFileSync(join(root, '#U8bd5.txt'), '');

      createProgram().parse([
        'node',
        'encoding-repair',
        'fix-names',
        '--no-folders',
        root
      ]);

      expect(process.exitCode).toBeUndefined();
      expect(existsSync(join(root, '#U6d4b'))).toBe(true);
      expect(existsSync(join(root, '测'))).toBe(false);
      expect(existsSync(join(root, '试.txt'))).toBe(true);
    });
  });
});
