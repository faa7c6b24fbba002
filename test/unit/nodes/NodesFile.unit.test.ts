import fs from 'fs/promises';
import path from 'path';
import { InconsistencyError } from '../../../src/common/errors';
import { NodesFile, formatNodesList, parseNodesList } from '../../../src/nodes/NodesFile';
import { makeTempDir, removeTempDir } from '../../helpers/fakes';

describe('nodes list format', () => {
  it('should keep blank lines as empty positions and trim whitespace', () => {
    expect(parseNodesList('10.0.0.10\n\n  10.0.0.12  \n')).toEqual(['10.0.0.10', '', '10.0.0.12']);
    expect(parseNodesList('10.0.0.10\n\n')).toEqual(['10.0.0.10', '']);
  });

  it('should read a file without a final newline or content', () => {
    expect(parseNodesList('10.0.0.10\n10.0.0.11')).toEqual(['10.0.0.10', '10.0.0.11']);
    expect(parseNodesList('')).toEqual([]);
  });

  it('should end every address with a newline', () => {
    expect(formatNodesList(['10.0.0.10', '10.0.0.11'])).toBe('10.0.0.10\n10.0.0.11\n');
    expect(formatNodesList([])).toBe('');
  });
});

describe('NodesFile', () => {
  let tempDir: string;
  let nodesFile: NodesFile;
  let realPath: string;
  let canonicalPath: string;

  beforeEach(async () => {
    tempDir = await makeTempDir('nodes-file');
    realPath = path.join(tempDir, 'shared', 'nodes');
    canonicalPath = path.join(tempDir, 'etc', 'ctdb', 'nodes');
    nodesFile = new NodesFile({ realPath, canonicalPath });
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('should read a missing file as an empty list', async () => {
    await expect(nodesFile.read()).resolves.toEqual([]);
  });

  it('should replace the whole list on write', async () => {
    await nodesFile.write(['10.0.0.10', '10.0.0.11']);
    await nodesFile.write(['10.0.0.12']);

    expect(await fs.readFile(realPath, 'utf-8')).toBe('10.0.0.12\n');
  });

  it('should point the canonical path at the real path', async () => {
    await fs.mkdir(path.dirname(canonicalPath), { recursive: true });
    await fs.writeFile(canonicalPath, 'stale\n');

    await nodesFile.ensureLink();

    expect(await fs.readlink(canonicalPath)).toBe(realPath);
  });

  describe('ensureNodePresent', () => {
    it('should bootstrap the first node and link the canonical path', async () => {
      const nodes = await nodesFile.ensureNodePresent('10.0.0.10', 0);

      expect(nodes).toEqual(['10.0.0.10']);
      expect(await fs.readFile(canonicalPath, 'utf-8')).toBe('10.0.0.10\n');
    });

    it('should not add an address that is already listed', async () => {
      await nodesFile.write(['10.0.0.10', '10.0.0.11']);

      await expect(nodesFile.ensureNodePresent('10.0.0.11', 1)).resolves.toEqual(['10.0.0.10', '10.0.0.11']);
      expect(await fs.readFile(realPath, 'utf-8')).toBe('10.0.0.10\n10.0.0.11\n');
    });

    it('should fail when the address ends up at a different position', async () => {
      await nodesFile.write(['10.0.0.10']);

      await expect(nodesFile.ensureNodePresent('10.0.0.11', 0)).rejects.toThrow(InconsistencyError);
      await expect(nodesFile.ensureNodePresent('10.0.0.11', 0))
        .rejects.toThrow('expected pnn 0 for 10.0.0.11, found it at 1');
      expect(await fs.readFile(realPath, 'utf-8')).toBe('10.0.0.10\n');
    });

    it('should work without a canonical path', async () => {
      const plain = new NodesFile({ realPath });
      await expect(plain.ensureNodePresent('10.0.0.10')).resolves.toEqual(['10.0.0.10']);
      await expect(fs.lstat(canonicalPath)).rejects.toThrow();
    });
  });
});
