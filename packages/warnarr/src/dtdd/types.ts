/**
 * DoesTheDogDie.com entities, as the rest of warnarr sees them.
 * Raw API field names are mapped in decode.ts.
 */

/** One search hit */
export interface RemoteEntity {
  id: number;
  title: string;
  releaseYear: string;    // kept as a string; compared as a string
  itemType: string;       // e.g. "Movie", "TV Show", "Book"
}

export interface TopicStat {
  topicName: string;      // e.g. "a dog dies"
  topicNotName: string;   // e.g. "no dogs die"
  yesCount: number;
  noCount: number;
}

/** Full detail record for one DTDD media id */
export interface RemoteMediaRecord {
  topicStats: TopicStat[];
}
