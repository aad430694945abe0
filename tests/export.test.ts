import fs from 'fs';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { npyHeader, saveStackedUint8 } from '../src/main/npy';
import { SessionExporter, sessionFolderName } from '../src/main/sessionExporter';
import { keysToDirections } from '../src/main/transforms';
import { FfmpegVideoWriter } from '../src/main/videoWriter';
import { DatasetItem } from '../src/types/events';
import { MemoryVideoWriter, TINY_FORMAT, makeTempDir, pixels } from './helpers';

describe('npyHeader', () => {
  it('starts with the magic string and version 1.0', () => {
    const header = npyHeader([2, 3]);
    expect([...header.subarray(0, 8)]).toEqual([0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59, 1, 0]);
  });

  it('pads the preamble to a multiple of 64 bytes ending in a newline', () => {
    for (const shape of [[1], [2, 3], [120, 160, 120, 3]]) {
      const header = npyHeader(shape);
      expect(header.length % 64).toBe(0);
      expect(header.readUInt16LE(8)).toBe(header.length - 10);
      expect(header[header.length - 1]).toBe(0x0a);
    }
  });

  it('describes a C-ordered uint8 array of the given shape', () => {
    const text = npyHeader([2, 3]).subarray(10).toString('latin1').trimEnd();
    expect(text).toBe("{'descr': '|u1', 'fortran_order': False, 'shape': (2, 3), }");
  });

  it('writes one-dimensional shapes as a one-tuple', () => {
    const text = npyHeader([5]).subarray(10).toString('latin1');
    expect(text).toContain("'shape': (5,)");
  });
});

describe('saveStackedUint8', () => {
  it('writes the header followed by the rows', () => {
    const file = path.join(makeTempDir(), 'rows.npy');
    saveStackedUint8(file, [Uint8Array.from([1, 2]), Uint8Array.from([3, 4])], [2]);

    const raw = fs.readFileSync(file);
    const headerLength = npyHeader([2, 2]).length;
    expect(raw.length).toBe(headerLength + 4);
    expect([...raw.subarray(headerLength)]).toEqual([1, 2, 3, 4]);
  });

  it('rejects rows of the wrong size', () => {
    const file = path.join(makeTempDir(), 'rows.npy');
    expect(() => saveStackedUint8(file, [Uint8Array.from([1, 2, 3])], [2])).toThrow(
      'row 0 has 3 bytes, expected 2 for shape [2]'
    );
  });
});

describe('keysToDirections', () => {
  it('encodes held keys in recording-key order', () => {
    expect([...keysToDirections(['d', 'w'], ['w', 'a', 's', 'd'])]).toEqual([1, 0, 0, 1]);
  });

  it('ignores case and keys outside the recording set', () => {
    expect([...keysToDirections(['A', 'space'], ['w', 'a'])]).toEqual([0, 1]);
  });

  it('encodes an empty key list as zeros', () => {
    expect([...keysToDirections([], ['w', 'a', 's'])]).toEqual([0, 0, 0]);
  });
});

describe('SessionExporter', () => {
  const item = (timestamp: number, keyCodes: string[] = []): DatasetItem => ({
    screen: pixels(7),
    keyCodes,
    timestamp
  });

  it('names folders after the local date and time', () => {
    expect(sessionFolderName(new Date(2024, 0, 31, 23, 59, 5))).toBe('20240131-235905');
    expect(sessionFolderName(new Date(2023, 10, 2, 7, 4, 0))).toBe('20231102-070400');
  });

  it('suffixes folders of sessions saved within the same second', async () => {
    const saveDir = makeTempDir();
    const exporter = new SessionExporter({
      saveDir,
      recordingKeys: ['w'],
      outputFormat: TINY_FORMAT,
      videoWriter: new MemoryVideoWriter()
    });
    const now = new Date(2024, 4, 6, 12, 0, 0);
    const stats = { averageFps: 10, inconsistentReleases: 0 };

    const first = await exporter.export([item(0), item(0.1)], stats, now);
    const second = await exporter.export([item(0), item(0.1)], stats, now);

    expect(first).toBe('20240506-120000');
    expect(second).toBe('20240506-120000-1');
    expect(fs.readdirSync(saveDir).sort()).toEqual([first, second]);
  });

  it('creates the save directory when it is missing', async () => {
    const saveDir = path.join(makeTempDir(), 'nested', 'data');
    const exporter = new SessionExporter({
      saveDir,
      recordingKeys: ['w', 'a'],
      outputFormat: TINY_FORMAT,
      videoWriter: new MemoryVideoWriter()
    });

    const folder = await exporter.export([item(0, ['a']), item(0.5)], { averageFps: 2, inconsistentReleases: 2 });
    const meta = JSON.parse(fs.readFileSync(path.join(saveDir, folder, 'session.json'), 'utf-8'));

    expect(meta).toMatchObject({ itemCount: 2, averageFps: 2, inconsistentReleases: 2, endedAt: 0.5 });
  });

  it('removes the session folder when a write fails', async () => {
    const saveDir = makeTempDir();
    const exporter = new SessionExporter({
      saveDir,
      recordingKeys: ['w'],
      outputFormat: TINY_FORMAT,
      videoWriter: new MemoryVideoWriter()
    });
    const truncated: DatasetItem = { screen: Buffer.alloc(3), keyCodes: [], timestamp: 0.1 };

    await expect(
      exporter.export([item(0), truncated], { averageFps: 10, inconsistentReleases: 0 })
    ).rejects.toThrow('row 1 has 3 bytes, expected 12');
    expect(fs.readdirSync(saveDir)).toEqual([]);
  });
});

describe('FfmpegVideoWriter', () => {
  it('rejects when the encoder cannot be started', async () => {
    const writer = new FfmpegVideoWriter(path.join(makeTempDir(), 'no-such-ffmpeg'));
    await expect(writer.write(path.join(makeTempDir(), 'out.avi'), [], TINY_FORMAT, 10)).rejects.toThrow();
  });
});
