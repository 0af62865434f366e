/**
 * Bin Discovery
 *
 * Walks the media pool and picks the bin holding the multitrack clips,
 * either from an interactive chooser or by name.
 */

import {
  PreconditionError,
  SelectionError,
  type HostFolder,
} from '@edit-assist/core';

export interface BinEntry {
  folder: HostFolder;
  name: string;
  /** Slash-separated path from the root folder */
  path: string;
  clipCount: number;
}

/**
 * Interactive chooser: resolves to the index of the chosen bin, or null
 * when the user dismissed the choice.
 */
export type BinChooser = (bins: readonly BinEntry[]) => Promise<number | null> | number | null;

/**
 * Every folder (root included) that directly holds at least one clip,
 * depth-first in host order.
 */
export function collectBins(folder: HostFolder, parentPath = ''): BinEntry[] {
  const name = folder.getName();
  const path = parentPath ? `${parentPath}/${name}` : name;
  const clipCount = folder.getClips().length;

  const bins: BinEntry[] = [];
  if (clipCount > 0) {
    bins.push({ folder, name, path, clipCount });
  }
  for (const child of folder.getSubFolders()) {
    bins.push(...collectBins(child, path));
  }
  return bins;
}

export function describeBin(bin: BinEntry): string {
  return `${bin.name} (${bin.clipCount} clips)`;
}

/**
 * The single bin whose name equals `binName` ignoring case, or null when
 * none does. Several matches are ambiguous.
 */
export function findBinByName(bins: readonly BinEntry[], binName: string): BinEntry | null {
  const wanted = binName.toUpperCase();
  const matches = bins.filter((bin) => bin.name.toUpperCase() === wanted);
  if (matches.length > 1) {
    throw new SelectionError(
      `Bin name "${binName}" is ambiguous: ${matches.map((bin) => bin.path).join(', ')}`,
      { binName, paths: matches.map((bin) => bin.path) }
    );
  }
  return matches[0] ?? null;
}

export interface BinSelectionOptions {
  binName: string;
  choose?: BinChooser;
}

export async function selectMultitrackBin(
  bins: readonly BinEntry[],
  options: BinSelectionOptions
): Promise<BinEntry> {
  if (bins.length === 0) {
    throw new PreconditionError('No bins with clips found');
  }

  if (options.choose) {
    const index = await options.choose(bins);
    if (index !== null) {
      const chosen = bins[index];
      if (!chosen) {
        throw new SelectionError(
          `Bin selection ${index + 1} is out of range (1-${bins.length})`,
          { index, available: bins.length }
        );
      }
      return chosen;
    }
  }

  const named = findBinByName(bins, options.binName);
  if (!named) {
    throw new SelectionError(
      `Could not auto-detect multitrack bin. Rename your multitrack bin to "${options.binName}" ` +
        'or set multitrack_bin_name.',
      { binName: options.binName, available: bins.map(describeBin) }
    );
  }
  return named;
}
