import { load } from "cheerio";
import { fetch as undiciFetch } from "undici";

import { DisambiguationError, KnowledgeSourceError, PageNotFoundError } from "./errors";

export interface WikiPage {
  title: string;
  url: string;
  text: string;
}

/**
 * Read-only view of an encyclopedia. `summary` and `page` reject with
 * PageNotFoundError or DisambiguationError when the topic does not name a single article.
 */
export interface KnowledgeSource {
  summary(topic: string): Promise<string>;
  page(topic: string): Promise<WikiPage>;
  search(topic: string, limit?: number): Promise<string[]>;
}

export interface WikipediaClientOptions {
  language?: string;
  summarySentences?: number;
  userAgent?: string;
}

const DEFAULT_USER_AGENT = "wiki-react-agent/0.1 (ReAct question answering demo)";

function resolveFetch(): typeof globalThis.fetch {
  if (typeof globalThis.fetch === "function") {
    return globalThis.fetch.bind(globalThis) as unknown as typeof globalThis.fetch;
  }
  return undiciFetch as unknown as typeof globalThis.fetch;
}

export function toTitleSlug(topic: string): string {
  return encodeURIComponent(topic.trim().replace(/ /g, "_"));
}

export function firstSentences(text: string, count: number): string {
  const sentences = text
    .trim()
    .split(/(?<=[.!?])\s+/)
    .filter((sentence) => sentence.length > 0);
  return sentences.slice(0, count).join(" ");
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

interface SummaryPayload {
  type?: string;
  title?: string;
  extract?: string;
}

interface SearchPayload {
  query?: {
    search?: Array<{ title?: string }>;
  };
}

export class WikipediaClient implements KnowledgeSource {
  private readonly language: string;
  private readonly summarySentences: number;
  private readonly userAgent: string;

  constructor(options: WikipediaClientOptions = {}) {
    this.language = options.language ?? "en";
    this.summarySentences = options.summarySentences ?? 4;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  private get siteBase(): string {
    return `https://${this.language}.wikipedia.org`;
  }

  async summary(topic: string): Promise<string> {
    const response = await this.get(`${this.siteBase}/api/rest_v1/page/summary/${toTitleSlug(topic)}`);
    if (response.status === 404) {
      throw new PageNotFoundError(topic);
    }
    this.ensureOk(response, topic);
    const payload = (await response.json()) as SummaryPayload;
    if (payload.type === "disambiguation") {
      throw new DisambiguationError(topic);
    }
    if (!payload.extract) {
      throw new PageNotFoundError(topic);
    }
    return firstSentences(payload.extract, this.summarySentences);
  }

  async page(topic: string): Promise<WikiPage> {
    const response = await this.get(`${this.siteBase}/api/rest_v1/page/html/${toTitleSlug(topic)}`);
    if (response.status === 404) {
      throw new PageNotFoundError(topic);
    }
    this.ensureOk(response, topic);
    const html = await response.text();
    const $ = load(html);

    if ($('meta[property="mw:PageProp/disambiguation"]').length) {
      const options = $("body li a[rel='mw:WikiLink']")
        .map((_idx, el) => $(el).attr("title") ?? "")
        .get()
        .filter((title) => title.length > 0);
      throw new DisambiguationError(topic, options);
    }

    const title = $("title").first().text().trim() || topic.trim();
    const canonical = $('link[rel="dc:isVersionOf"]').attr("href");
    const url = canonical
      ? canonical.startsWith("//")
        ? `https:${canonical}`
        : canonical
      : `${this.siteBase}/wiki/${toTitleSlug(title)}`;

    const body = $("body").clone();
    body.find("script, style, noscript, sup.reference, .mw-ref, .reflist, table.infobox").remove();
    body.find("br").replaceWith("\n");
    body.find("p, div, li, h1, h2, h3, h4, h5, h6").append("\n");
    const text = collapseWhitespace(body.text());

    return { title, url, text };
  }

  async search(topic: string, limit = 10): Promise<string[]> {
    const endpoint = new URL(`${this.siteBase}/w/api.php`);
    endpoint.searchParams.set("action", "query");
    endpoint.searchParams.set("list", "search");
    endpoint.searchParams.set("srsearch", topic);
    endpoint.searchParams.set("srlimit", String(limit));
    endpoint.searchParams.set("format", "json");
    const response = await this.get(endpoint.toString());
    this.ensureOk(response, topic);
    const payload = (await response.json()) as SearchPayload;
    return (payload.query?.search ?? [])
      .map((result) => result.title ?? "")
      .filter((title) => title.length > 0);
  }

  private async get(url: string): Promise<Response> {
    const fetchFn = resolveFetch();
    try {
      return await fetchFn(url, {
        headers: {
          "User-Agent": this.userAgent,
          Accept: "application/json, text/html",
        },
        redirect: "follow",
      });
    } catch (error) {
      throw new KnowledgeSourceError(`Wikipedia request failed: ${String(error)}`);
    }
  }

  private ensureOk(response: Response, topic: string): void {
    if (!response.ok) {
      throw new KnowledgeSourceError(
        `Wikipedia returned status ${response.status} for "${topic}"`,
        response.status,
      );
    }
  }
}
