import { useSyncExternalStore } from "react";

import type { NotificationCenter, Toast } from "../lib/notifications";

export function useToasts(center: NotificationCenter): readonly Toast[] {
  return useSyncExternalStore(center.subscribe, center.getActive, center.getActive);
}
