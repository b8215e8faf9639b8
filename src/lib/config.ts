export const config = {
  dbPath: process.env.DB_PATH || "data/reviews.db",
  tablePrefix: process.env.TABLE_PREFIX || "wp_",
  scrapeDelayMs: parseInt(process.env.SCRAPE_DELAY_MS || "1000", 10),
  fetchRetries: parseInt(process.env.FETCH_RETRIES || "3", 10),
  fetchRetryDelayMs: parseInt(process.env.FETCH_RETRY_DELAY_MS || "2000", 10),
  fetchTimeoutMs: parseInt(process.env.FETCH_TIMEOUT_MS || "20000", 10),
  reviewPageSize: parseInt(process.env.REVIEW_PAGE_SIZE || "100", 10),
  previewLimit: parseInt(process.env.PREVIEW_LIMIT || "10", 10),
  userAgents: [
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ],
  getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  },
};
