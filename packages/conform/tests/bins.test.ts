import { describe, expect, it } from 'vitest';
import { PreconditionError, SelectionError, type HostFolder, type HostMediaItem } from '@edit-assist/core';
import { collectBins, findBinByName, selectMultitrackBin } from '../src/bins.js';

function folder(name: string, clipCount: number, children: HostFolder[] = []): HostFolder {
  const clips: HostMediaItem[] = Array.from({ length: clipCount }, (_, index) => ({
    getName: () => `${name}_${index + 1}`,
    getClipProperty: () => undefined,
  }));
  return {
    getName: () => name,
    getClips: () => clips,
    getSubFolders: () => children,
  };
}

const root = folder('Master', 0, [
  folder('Dailies', 4, [folder('Empty', 0), folder('Tracks', 2)]),
  folder('Music', 1),
]);

describe('collectBins', () => {
  it('lists folders holding clips depth-first with their paths', () => {
    expect(collectBins(root).map(({ path, clipCount }) => `${path}:${clipCount}`)).toEqual([
      'Master/Dailies:4',
      'Master/Dailies/Tracks:2',
      'Master/Music:1',
    ]);
  });
});

describe('findBinByName', () => {
  it('matches names ignoring case', () => {
    expect(findBinByName(collectBins(root), 'TRACKS')?.path).toBe('Master/Dailies/Tracks');
    expect(findBinByName(collectBins(root), 'Sound')).toBeNull();
  });

  it('refuses to pick between bins with the same name', () => {
    const bins = collectBins(folder('Master', 0, [folder('Tracks', 1), folder('tracks', 1)]));
    expect(() => findBinByName(bins, 'TRACKS')).toThrow(SelectionError);
  });
});

describe('selectMultitrackBin', () => {
  const bins = collectBins(root);

  it('uses the chooser answer when one is given', async () => {
    const chosen = await selectMultitrackBin(bins, { binName: 'TRACKS', choose: () => 2 });
    expect(chosen.name).toBe('Music');
  });

  it('falls back to the configured name when the chooser declines', async () => {
    const chosen = await selectMultitrackBin(bins, { binName: 'TRACKS', choose: async () => null });
    expect(chosen.name).toBe('Tracks');
  });

  it('rejects a chooser answer out of range', async () => {
    await expect(selectMultitrackBin(bins, { binName: 'TRACKS', choose: () => 3 })).rejects.toThrow(
      'Bin selection 4 is out of range (1-3)'
    );
  });

  it('lists the available bins when nothing matches the name', async () => {
    await expect(selectMultitrackBin(bins, { binName: 'ISO' })).rejects.toMatchObject({
      code: 'SELECTION_ERROR',
      details: {
        binName: 'ISO',
        available: ['Dailies (4 clips)', 'Tracks (2 clips)', 'Music (1 clips)'],
      },
    });
  });

  it('needs at least one bin', async () => {
    await expect(selectMultitrackBin([], { binName: 'TRACKS' })).rejects.toThrow(PreconditionError);
  });
});
