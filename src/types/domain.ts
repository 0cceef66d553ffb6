// This file centralizes domain models shared by the catalog, navigation, quota ledger, export, and transport layers.

import type { DatasetSource } from '../dataset/source.js';

export interface Region {
  id: string;
  name: string;
}

export interface Station {
  id: string;
  name: string;
  regionId: string;
}

// This model captures one inclusive calendar-date interval in YYYY-MM-DD form.
export interface DateInterval {
  start: string;
  end: string;
}

// This snapshot is frozen after build and only ever replaced wholesale by the catalog index.
export interface CatalogSnapshot {
  readonly generation: number;
  readonly builtAt: string;
  readonly regions: readonly Region[];
  readonly stationsByRegion: ReadonlyMap<string, readonly Station[]>;
  readonly validity: ReadonlyMap<string, DateInterval>;
  readonly source: DatasetSource;
  readonly rowCount: number;
}

export type ListKind = 'regions' | 'stations';

export type NavigationToken =
  | { kind: 'list'; listKind: 'regions'; page: number }
  | { kind: 'list'; listKind: 'stations'; parentRegion: string; page: number }
  | { kind: 'pick_region'; regionId: string }
  | { kind: 'pick_station'; regionId: string; stationId: string }
  | { kind: 'back' }
  | { kind: 'admin_report' };

export type DecodedToken = NavigationToken | { kind: 'invalid'; reason: string };

export interface DownloadEvent {
  id: number;
  userId: string;
  displayName: string;
  regionId: string;
  stationId: string;
  stationName: string;
  eventDate: string;
  createdAt: string;
}

export interface DownloadRequest {
  userId: string;
  displayName: string;
  regionId: string;
  stationId: string;
  stationName: string;
}

// This model is derived from stored events on demand and never cached.
export interface QuotaWindow {
  todayCount: number;
  monthCount: number;
}

export type QuotaDenialReason = 'daily_limit' | 'monthly_limit' | 'ledger_unavailable';

export type ReserveResult =
  | { status: 'committed'; event: DownloadEvent }
  | { status: 'denied'; reason: QuotaDenialReason };

export type ExemptScope = 'all' | 'daily';

export interface QuotaPolicy {
  monthlyCap: number;
  exemptUserIds: ReadonlySet<string>;
  exemptScope: ExemptScope;
}

export type TriggerKind = 'command' | 'callback';

// This model is the transport-neutral shape of one inbound command or menu selection.
export interface Trigger {
  kind: TriggerKind;
  conversationId: string;
  messageId: string;
  userId: string;
  displayName: string;
  payload: string;
  callbackId?: string;
}

export type ButtonRole = 'item' | 'nav' | 'control';

export interface MenuButton {
  label: string;
  payload: string;
  role: ButtonRole;
}

export interface Screen {
  text: string;
  buttons: MenuButton[];
}

export interface RenderRequest {
  conversationId: string;
  messageId?: string;
  text: string;
  buttons?: MenuButton[];
}

export interface DocumentRequest {
  conversationId: string;
  fileName: string;
  contentType: string;
  bytes: Uint8Array;
  caption?: string;
}

// This interface is the only surface the bot core needs from a chat transport.
export interface ChatTransport {
  render(request: RenderRequest): Promise<void>;
  sendDocument(request: DocumentRequest): Promise<void>;
  acknowledge(callbackId: string, notice?: { text: string; alert: boolean }): Promise<void>;
}

export interface UserRef {
  userId: string;
  displayName: string;
}

export interface StationDownloadSummary {
  userId: string;
  totalDownloads: number;
  stationNames: string[];
}
