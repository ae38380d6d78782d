export { systemClock } from "./system-clock.js";
export { realTimerService, realDelay } from "./real-timers.js";
export { createProcessSignalHandler } from "./process-signals.js";
export {
  createHttpDownloader,
  parseContentLength,
  DEFAULT_USER_AGENT,
  type FetchFn,
  type HttpDownloaderOptions,
} from "./http-downloader.js";
export { createHttpListingFetcher, type HttpListingOptions } from "./http-listing.js";
