import { BaseStarrService, sumBy } from './baseStarrService.js';
import { formatBytes } from '../utils/formatUtils.js';
import type { ReadarrStats } from '../types/payload.js';
import type { ReadarrAuthor, ReadarrBook, StarrCalendarRecord, StarrRecord } from '../types/starr.js';
import type { StarrApiClient } from './starrApiClient.js';

export class ReadarrService extends BaseStarrService {
  readonly appType = 'readarr' as const;
  protected readonly appName = 'Readarr';
  protected readonly apiVersion = 'v1' as const;
  protected readonly includeParams = { includeAuthor: true, includeBook: true };
  protected readonly calendarIncludeParams = { includeAuthor: true };

  protected getRecordTitle(record: StarrRecord): string | undefined {
    if (!record.author) {
      return undefined;
    }
    return `${record.author.authorName ?? 'Unknown'} - ${record.book?.title ?? 'Unknown Book'}`;
  }

  protected getCalendarTitle(record: StarrCalendarRecord): string {
    return `${record.author?.authorName ?? 'Unknown'} - ${record.title ?? 'Unknown'}`;
  }

  protected getCalendarDate(record: StarrCalendarRecord): string | undefined {
    return record.releaseDate;
  }

  /**
   * Readarr reports zeros rather than an empty section when a listing fails
   */
  async getStats(client: StarrApiClient): Promise<ReadarrStats> {
    const authorData = await client.get<ReadarrAuthor[]>(this.endpoint('author'));
    const bookData = await client.get<ReadarrBook[]>(this.endpoint('book'));
    const monitoredMissing = await this.getMonitoredMissing(client);

    const authors = Array.isArray(authorData) ? authorData : [];
    const books = Array.isArray(bookData) ? bookData : [];
    const librarySize = sumBy(authors, author => author?.statistics?.sizeOnDisk);
    const onDisk = books.filter(book => (book?.statistics?.bookFileCount ?? 0) > 0).length;

    this.logger.debug(`📊 [Readarr] Stats computed for ${authors.length} authors and ${books.length} books`);
    return {
      total_authors: authors.length,
      total_books: books.length,
      books_on_disk: onDisk,
      monitored_missing: monitoredMissing,
      library_size_bytes: librarySize,
      library_size_formatted: formatBytes(librarySize)
    };
  }
}

export const readarrService = new ReadarrService();
