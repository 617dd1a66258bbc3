import type { Logger } from "../../core/logger";
import type { LocatorSet } from "../../platforms/screen";
import { locator } from "../../platforms/tiktok/selectors";
import type { DeviceSession } from "../../services/device-session";
import type { WorkflowStats } from "../stats";

interface PopupRule {
  /** Presence marker; the same set is clicked unless `dismiss` is "back". */
  marker: LocatorSet;
  dismiss: LocatorSet | "back";
}

const SYSTEM_DIALOGS: PopupRule[] = [
  { marker: locator("popup.system_permission_deny"), dismiss: locator("popup.system_permission_deny") },
  { marker: locator("popup.input_method"), dismiss: "back" },
];

const IN_APP_POPUPS: PopupRule[] = [
  { marker: locator("popup.collections_not_now"), dismiss: locator("popup.collections_not_now") },
  { marker: locator("popup.follow_friends_close"), dismiss: locator("popup.follow_friends_close") },
  { marker: locator("popup.link_email_not_now"), dismiss: locator("popup.link_email_not_now") },
  { marker: locator("popup.generic_close"), dismiss: locator("popup.generic_close") },
];

export class PopupHandler {
  constructor(
    private device: DeviceSession,
    private stats: WorkflowStats,
    private log: Logger,
    private probeTimeoutMs: number = 300
  ) {}

  async closeSystemDialogs(): Promise<number> {
    return this.closeMatching(SYSTEM_DIALOGS);
  }

  async closeInAppPopups(): Promise<number> {
    return this.closeMatching(IN_APP_POPUPS);
  }

  async dismissAll(): Promise<number> {
    const system = await this.closeSystemDialogs();
    const inApp = await this.closeInAppPopups();
    return system + inApp;
  }

  private async closeMatching(rules: PopupRule[]): Promise<number> {
    let closed = 0;
    for (const rule of rules) {
      if (!(await this.device.isPresent(rule.marker, this.probeTimeoutMs))) continue;

      const dismissed =
        rule.dismiss === "back" ? await this.device.back() : await this.device.tryClick(rule.dismiss, this.probeTimeoutMs);
      if (dismissed) {
        closed++;
        this.stats.increment("popups_closed");
        this.log.debug({ popup: rule.marker.name }, "Popup closed");
      }
    }
    return closed;
  }
}
