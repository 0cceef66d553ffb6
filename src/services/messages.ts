// This module holds every user-facing bot text so wording changes stay out of the flow logic.

import type { DateInterval, DownloadEvent, StationDownloadSummary } from '../types/domain.js';

// Telegram rejects message texts longer than this many characters.
export const MESSAGE_TEXT_LIMIT = 4096;

// This helper packs text blocks into as few messages as fit the limit; only a block longer than the limit is cut.
export function packMessages(blocks: readonly string[], separator: string, limit = MESSAGE_TEXT_LIMIT): string[] {
  const texts: string[] = [];
  let current = '';

  for (const block of blocks) {
    for (let offset = 0; offset < block.length; offset += limit) {
      const piece = block.slice(offset, offset + limit);
      if (current.length === 0) {
        current = piece;
      } else if (current.length + separator.length + piece.length <= limit) {
        current += separator + piece;
      } else {
        texts.push(current);
        current = piece;
      }
    }
  }

  if (current.length > 0) {
    texts.push(current);
  }

  return texts;
}

export const messages = {
  welcome: (name: string): string => `👋 Welcome ${name}!\nPlease select a province:`,
  selectRegion: 'Please select a province:',
  selectRegionAgain: 'Please select a province again:',
  backToRegions: '🔙 Back to province selection:',
  menuExpired: '⚠️ This menu is no longer valid. Please select a province:',
  noRegions: '⚠️ No provinces are available right now. Please try again later.',
  noStations: '⚠️ No stations found for this province.',
  invalidSelection: '⚠️ Invalid selection.',
  selectStation: (regionName: string): string => `🏞 Selected province: ${regionName}\nPlease select a synoptic station:`,
  stationInfo: (stationName: string, interval: DateInterval): string =>
    `🌡 Selected station: ${stationName}\nData available from ${interval.start} to ${interval.end}`,
  noData: 'No data available for this station.',
  exportUnavailable: '⚠️ Data for this station is currently unavailable.',
  quotaReached: (monthlyCap: number): string =>
    monthlyCap > 0
      ? `❌ You have already downloaded a station today or reached the ${monthlyCap}-stations-per-month limit.`
      : '❌ You have already downloaded a station today.',
  ledgerUnavailable: '⚠️ Downloads are temporarily unavailable. Please try again later.',
  guideMissing: '⚠️ The PDF guide is not available on the server.',
  csvCaption: (stationName: string, interval: DateInterval): string =>
    `✅ ${stationName} (${interval.start} to ${interval.end})`,
  guideCaption: '📘 Data usage guide',
  genericFailure: '⚠️ Something went wrong. Please try again.',
  help: (monthlyCap: number): string =>
    [
      'ℹ️ Help & Usage Guide',
      '',
      '1️⃣ Use /start to begin.',
      '2️⃣ Select a province, then choose a synoptic station.',
      '3️⃣ Download the available data (CSV + PDF).',
      '',
      monthlyCap > 0
        ? `⚠️ Limit: one station per day and ${monthlyCap} stations per month per user.`
        : '⚠️ Limit: one station per day per user.',
      '📌 This bot is for academic and research purposes only.'
    ].join('\n'),
  unknownCommand: 'Use /start to browse stations or /help for usage.',
  notAuthorized: '⛔ You are not authorized to use this command.',
  reportEmpty: '📭 No downloads recorded today.',
  report: (events: DownloadEvent[]): string[] =>
    packMessages(
      [
        '📊 Daily Download Report',
        ...events.map(
          (event) =>
            `- 👤 ${event.displayName || 'N/A'} (ID: ${event.userId})\n  📍 ${event.stationName || event.stationId} | ${event.eventDate}`
        )
      ],
      '\n\n'
    ),
  userUsage: 'Usage: /user <user_id>\nExample: /user 244146213',
  userNotFound: (userId: string): string => `ℹ️ No downloads found for user ${userId}.`,
  userSummary: (summary: StationDownloadSummary): string =>
    [
      `👤 User ID: ${summary.userId}`,
      `⬇️ Total downloads: ${summary.totalDownloads}`,
      '',
      '📡 Stations:',
      ...summary.stationNames.map((name) => `• ${name}`)
    ].join('\n'),
  usersCount: (count: number): string => `👥 Total users:\n${count}`,
  reloadStarted: '🔄 Rebuilding the station catalog...',
  reloadCompleted: (regionCount: number, stationCount: number, generation: number): string =>
    `✅ Catalog generation ${generation}: ${regionCount} provinces, ${stationCount} stations.`,
  adminNotification: (displayName: string, userId: string, stationName: string): string =>
    `- 👤 ${displayName} (ID: ${userId})\n  📍 ${stationName}`,
  buttons: {
    previous: '⬅️ Prev',
    next: 'Next ➡️',
    backToRegions: '🔙 Back to Provinces',
    adminReport: '📊 Admin Report'
  }
} as const;
