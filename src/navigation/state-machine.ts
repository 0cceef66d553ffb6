// This module interprets decoded navigation tokens against the current catalog snapshot to produce the next menu.

import type { CatalogIndex } from '../catalog/catalog-index.js';
import type { QuotaLedger } from '../quota/quota-ledger.js';
import { messages } from '../services/messages.js';
import type {
  DateInterval,
  DecodedToken,
  MenuButton,
  Region,
  Screen,
  Station,
  UserRef
} from '../types/domain.js';
import { encodeListToken, encodeToken } from './token-codec.js';

export type NavigationOutcome =
  | { kind: 'render'; mode: 'send' | 'edit'; screen: Screen }
  | { kind: 'alert'; text: string }
  | { kind: 'notice'; text: string }
  | { kind: 'download'; region: Region; station: Station; interval: DateInterval }
  | { kind: 'admin_report' }
  | { kind: 'ignore'; reason: string };

export interface NavigationMachineOptions {
  catalog: CatalogIndex;
  ledger: QuotaLedger;
  pageSize: number;
  adminIds: ReadonlySet<string>;
  monthlyCap: number;
  today: () => string;
}

export interface PageWindow<T> {
  items: T[];
  page: number;
  pageCount: number;
}

// This helper slices one page and clamps out-of-range pages to the nearest valid page.
export function paginate<T>(items: readonly T[], page: number, pageSize: number): PageWindow<T> {
  const size = Math.max(1, pageSize);
  const pageCount = Math.max(1, Math.ceil(items.length / size));
  const clamped = Math.min(Math.max(0, page), pageCount - 1);
  const start = clamped * size;

  return {
    items: items.slice(start, start + size),
    page: clamped,
    pageCount
  };
}

// No state is kept between calls; every transition is derived from the token and the published snapshot.
export class NavigationMachine {
  private readonly catalog: CatalogIndex;
  private readonly ledger: QuotaLedger;
  private readonly pageSize: number;
  private readonly adminIds: ReadonlySet<string>;
  private readonly monthlyCap: number;
  private readonly today: () => string;

  public constructor(options: NavigationMachineOptions) {
    this.catalog = options.catalog;
    this.ledger = options.ledger;
    this.pageSize = options.pageSize;
    this.adminIds = options.adminIds;
    this.monthlyCap = options.monthlyCap;
    this.today = options.today;
  }

  public isAdmin(userId: string): boolean {
    return this.adminIds.has(userId);
  }

  // This method renders the root menu, which is the first page of the region list.
  public start(user: UserRef, text: string = messages.welcome(user.displayName)): NavigationOutcome {
    return { kind: 'render', mode: 'send', screen: this.regionListScreen(0, user, text) };
  }

  public async handle(token: DecodedToken, user: UserRef): Promise<NavigationOutcome> {
    switch (token.kind) {
      case 'invalid':
        return this.start(user, messages.menuExpired);
      case 'list':
        if (token.listKind === 'regions') {
          return { kind: 'render', mode: 'edit', screen: this.regionListScreen(token.page, user, messages.selectRegion) };
        }
        return this.showStations(token.parentRegion, token.page, user);
      case 'pick_region':
        return this.showStations(token.regionId, 0, user);
      case 'back':
        return { kind: 'render', mode: 'edit', screen: this.regionListScreen(0, user, messages.backToRegions) };
      case 'pick_station':
        return this.pickStation(token.regionId, token.stationId, user);
      case 'admin_report':
        return this.isAdmin(user.userId) ? { kind: 'admin_report' } : { kind: 'ignore', reason: 'not_admin' };
    }
  }

  public regionListScreen(page: number, user: UserRef, text: string): Screen {
    const regions = this.catalog.regions();
    if (regions.length === 0) {
      return { text: messages.noRegions, buttons: [] };
    }

    const window = paginate(regions, page, this.pageSize);
    const buttons: MenuButton[] = window.items.map((region) => ({
      label: region.name,
      payload: encodeToken({ kind: 'pick_region', regionId: region.id }),
      role: 'item'
    }));

    buttons.push(...this.navButtons(window, (target) => encodeListToken('regions', undefined, target)));

    if (this.isAdmin(user.userId)) {
      buttons.push({ label: messages.buttons.adminReport, payload: encodeToken({ kind: 'admin_report' }), role: 'control' });
    }

    return { text, buttons };
  }

  public stationListScreen(region: Region, page: number): Screen {
    const window = paginate(this.catalog.stations(region.id), page, this.pageSize);
    const buttons: MenuButton[] = window.items.map((station) => ({
      label: station.name,
      payload: encodeToken({ kind: 'pick_station', regionId: region.id, stationId: station.id }),
      role: 'item'
    }));

    buttons.push(...this.navButtons(window, (target) => encodeListToken('stations', region.id, target)));
    buttons.push({ label: messages.buttons.backToRegions, payload: encodeToken({ kind: 'back' }), role: 'control' });

    return { text: messages.selectStation(region.name), buttons };
  }

  private navButtons<T>(window: PageWindow<T>, tokenFor: (page: number) => string): MenuButton[] {
    const buttons: MenuButton[] = [];
    if (window.page > 0) {
      buttons.push({ label: messages.buttons.previous, payload: tokenFor(window.page - 1), role: 'nav' });
    }
    if (window.page < window.pageCount - 1) {
      buttons.push({ label: messages.buttons.next, payload: tokenFor(window.page + 1), role: 'nav' });
    }
    return buttons;
  }

  private showStations(regionId: string, page: number, user: UserRef): NavigationOutcome {
    const region = this.catalog.findRegion(regionId);
    if (!region || this.catalog.stations(region.id).length === 0) {
      return { kind: 'render', mode: 'edit', screen: this.regionListScreen(0, user, messages.noStations) };
    }

    return { kind: 'render', mode: 'edit', screen: this.stationListScreen(region, page) };
  }

  private async pickStation(regionId: string, stationId: string, user: UserRef): Promise<NavigationOutcome> {
    const region = this.catalog.findRegion(regionId);
    const station = region ? this.catalog.findStation(region.id, stationId) : null;
    if (!region || !station) {
      return { kind: 'render', mode: 'edit', screen: this.regionListScreen(0, user, messages.invalidSelection) };
    }

    if (!(await this.ledger.canDownload(user.userId, this.today()))) {
      return { kind: 'alert', text: messages.quotaReached(this.monthlyCap) };
    }

    const interval = this.catalog.validity(region.id, station.id);
    if (!interval) {
      return { kind: 'notice', text: messages.noData };
    }

    return { kind: 'download', region, station, interval };
  }
}
