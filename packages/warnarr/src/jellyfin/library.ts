/**
 * Jellyfin ↔ pipeline adapters: item mapping, library selection, write-back.
 */

import type { MediaItem } from '../matching/types.js';
import type { DescriptionWriter } from '../pipeline/types.js';
import type { JellyfinClient, JfLibrary, JfMovie } from './client.js';

export type LibrarySource = Pick<
  JellyfinClient,
  'getLibraries' | 'getMovieLibraries' | 'getLibraryMovies' | 'searchLibraryMovies'
>;

export function toMediaItem(movie: JfMovie): MediaItem {
  const imdb = movie.ProviderIds?.Imdb?.trim();
  return {
    id: movie.Id,
    title: movie.Name,
    year: typeof movie.ProductionYear === 'number' ? movie.ProductionYear : null,
    imdbId: imdb ? imdb : null,
    description: movie.Overview ?? '',
  };
}

export interface LibrarySelection {
  libraries: JfLibrary[];
  warnings: string[];   // configured names that were skipped, and why
}

/**
 * Configured names → movie libraries. With no names configured, every movie
 * library is selected.
 */
export async function resolveLibraries(
  source: LibrarySource,
  names: string[]
): Promise<LibrarySelection> {
  if (names.length === 0) {
    return { libraries: await source.getMovieLibraries(), warnings: [] };
  }

  const all = await source.getLibraries();
  const libraries: JfLibrary[] = [];
  const warnings: string[] = [];

  for (const name of names) {
    const lib = all.find(l => l.Name === name);
    if (!lib) {
      warnings.push(`Library '${name}' not found, skipping.`);
    } else if (lib.CollectionType !== 'movies') {
      warnings.push(`'${name}' is not a movie library (type: ${lib.CollectionType ?? 'mixed'}), skipping.`);
    } else {
      libraries.push(lib);
    }
  }

  return { libraries, warnings };
}

export interface LibraryHooks {
  onLibrary?: (library: JfLibrary, count: number) => void;
  /** A library whose listing failed; iteration moves on to the next one */
  onLibraryError?: (library: JfLibrary, err: unknown) => void;
}

/** Every movie of each library, in library order, one library at a time */
export async function* iterateLibraries(
  source: LibrarySource,
  libraries: JfLibrary[],
  hooks: LibraryHooks = {}
): AsyncGenerator<MediaItem> {
  for (const lib of libraries) {
    let movies: JfMovie[];
    try {
      movies = await source.getLibraryMovies(lib.ItemId);
    } catch (err) {
      if (!hooks.onLibraryError) throw err;
      hooks.onLibraryError(lib, err);
      continue;
    }
    hooks.onLibrary?.(lib, movies.length);
    for (const movie of movies) yield toMediaItem(movie);
  }
}

/** Movies whose name equals `title` (case-insensitive) across the libraries */
export async function findMoviesByTitle(
  source: LibrarySource,
  libraries: JfLibrary[],
  title: string
): Promise<MediaItem[]> {
  const wanted = title.trim().toLowerCase();
  const found: MediaItem[] = [];
  for (const lib of libraries) {
    const hits = await source.searchLibraryMovies(lib.ItemId, title);
    for (const movie of hits) {
      if (movie.Name.trim().toLowerCase() === wanted) found.push(toMediaItem(movie));
    }
  }
  return found;
}

export class JellyfinWriter implements DescriptionWriter {
  constructor(private client: Pick<JellyfinClient, 'updateOverview'>) {}

  async updateDescription(item: MediaItem, description: string): Promise<void> {
    await this.client.updateOverview(item.id, description);
  }
}
