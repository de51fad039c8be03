import { toArticle } from '../news/articles';
import type { Article, Category, FeedDescriptor, FeedSource } from '../news/types';

export function newsArticle(
  title: string,
  category: Category = 'World',
  source = 'Wire Service',
  description = 'Details are still coming in.'
): Article {
  return toArticle({ title, description, source, category, link: `https://example.com/${encodeURIComponent(title)}` });
}

/** One feed per entry; a feed whose url is in `failing` rejects. */
export class FakeFeedSource implements FeedSource {
  calls = 0;
  readonly fetched: string[] = [];
  private readonly byUrl = new Map<string, Article[]>();
  private readonly failing = new Set<string>();

  addFeed(name: string, category: Category, articles: Article[]): FeedDescriptor {
    const url = `https://feeds.example.com/${encodeURIComponent(name)}`;
    this.byUrl.set(url, articles);
    return { name, category, url };
  }

  addFailingFeed(name: string, category: Category): FeedDescriptor {
    const url = `https://feeds.example.com/${encodeURIComponent(name)}`;
    this.failing.add(url);
    return { name, category, url };
  }

  async fetchFeed(feed: FeedDescriptor): Promise<Article[]> {
    this.calls += 1;
    this.fetched.push(feed.name);
    if (this.failing.has(feed.url)) throw new Error(`connect ECONNREFUSED ${feed.url}`);
    return this.byUrl.get(feed.url) ?? [];
  }
}
