export interface CrawlSeed {
  url: string;
  scopeType: "page";
}

export interface CrawlSeedsConfig {
  seeds: CrawlSeed[];
  scopeType: "page";
  extraHops: number;
  useSitemap: boolean;
  failOnFailedSeed: boolean;
  behaviorTimeout: number | null;
  pageLoadTimeout: number | null;
  pageExtraDelay: number | null;
  postLoadDelay: number;
  userAgent: string | null;
  limit: number | null;
  lang: string;
  exclude: string[];
  behaviors: string;
}

export interface CrawlConfigPayload {
  jobType: "custom";
  name: string;
  description: string | null;
  scale: number;
  profileid: string;
  runNow: boolean;
  schedule: string;
  crawlTimeout: number;
  maxCrawlSize: number;
  tags: string[];
  autoAddCollections: string[];
  config: CrawlSeedsConfig;
  crawlerChannel: string;
  proxyId: string | null;
}

export const MAX_CRAWL_SIZE_BYTES = 1_000_000_000;

/** Single-page crawl of `url`, started immediately. An empty profile id means no browser profile. */
export function buildCrawlConfig(url: string, profileId: string | null): CrawlConfigPayload {
  return {
    jobType: "custom",
    name: "",
    description: null,
    scale: 1,
    profileid: profileId ?? "",
    runNow: true,
    schedule: "",
    crawlTimeout: 0,
    maxCrawlSize: MAX_CRAWL_SIZE_BYTES,
    tags: [],
    autoAddCollections: [],
    config: {
      seeds: [{ url, scopeType: "page" }],
      scopeType: "page",
      extraHops: 0,
      useSitemap: false,
      failOnFailedSeed: false,
      behaviorTimeout: null,
      pageLoadTimeout: null,
      pageExtraDelay: null,
      postLoadDelay: 120,
      userAgent: null,
      limit: null,
      lang: "en",
      exclude: [],
      behaviors: "autoscroll,autoplay,autofetch,siteSpecific"
    },
    crawlerChannel: "default",
    proxyId: null
  };
}
