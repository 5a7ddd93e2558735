import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { StorageTool } from '../lib/tools/storage';
import { localStorage, makeTempDir, removeDir } from './fakes';

describe('StorageTool (local)', () => {
  let dir: string;
  let storage: StorageTool;

  beforeEach(async () => {
    dir = await makeTempDir();
    storage = localStorage(dir);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should write nested paths and read them back', async () => {
    const written = await storage.put('news/all_news_20240601_120000.json', '[]', 'application/json');

    expect(written).toBe(path.join(dir, 'news', 'all_news_20240601_120000.json'));
    expect((await storage.get('news/all_news_20240601_120000.json')).toString('utf-8')).toBe('[]');
    expect(await storage.exists('news/all_news_20240601_120000.json')).toBe(true);
    expect(await storage.exists('news/missing.json')).toBe(false);
  });

  it('should list objects under a prefix in path order', async () => {
    await storage.put('narration/b.json', '{}', 'application/json');
    await storage.put('narration/a.json', '{}', 'application/json');
    await storage.put('speech/a.mp3', Buffer.from('x'), 'audio/mpeg');

    const listed = await storage.list('narration/');

    expect(listed.map(obj => obj.path)).toEqual(['narration/a.json', 'narration/b.json']);
    expect(listed[0].size).toBe(2);
  });

  it('should list nothing when the data directory does not exist yet', async () => {
    const fresh = localStorage(path.join(dir, 'not-created'));
    expect(await fresh.list('')).toEqual([]);
  });

  it('should refuse paths outside the data directory', async () => {
    await expect(storage.put('../escape.txt', 'x', 'text/plain')).rejects.toThrow('escapes data directory');
  });
});
