export type { Clock } from "./clock.js";
export type { TimerService, DelayFn } from "./timer.js";
export type {
  FileDownloader,
  DownloadResult,
  DownloadOptions,
  HeadOptions,
} from "./download.js";
export type { ListingFetcher } from "./listing.js";
export type { SignalHandler } from "./signal-handler.js";
