export type ToastTone = "info" | "success" | "error";

export type Toast = {
  id: string;
  message: string;
  tone: ToastTone;
  createdAtMs: number;
  expiresAtMs: number;
};

type Listener = (active: readonly Toast[]) => void;

export interface NotificationCenter {
  notify(message: string, tone?: ToastTone): Toast;
  dismiss(id: string): void;
  clear(): void;
  getActive(): readonly Toast[];
  subscribe(listener: Listener): () => void;
}

type NotificationCenterOptions = {
  ttlMs?: number;
  now?: () => number;
};

export const DEFAULT_TOAST_TTL_MS = 2_500;

export function createNotificationCenter(options: NotificationCenterOptions = {}): NotificationCenter {
  const ttlMs = options.ttlMs ?? DEFAULT_TOAST_TTL_MS;
  const now = options.now ?? Date.now;
  const listeners = new Set<Listener>();
  const timers = new Map<string, ReturnType<typeof setTimeout>>();
  let active: readonly Toast[] = [];
  let sequence = 0;

  const publish = (next: readonly Toast[]) => {
    active = next;
    listeners.forEach((listener) => {
      listener(active);
    });
  };

  const dismiss = (id: string) => {
    const timer = timers.get(id);
    if (timer !== undefined) {
      clearTimeout(timer);
      timers.delete(id);
    }
    if (!active.some((toast) => toast.id === id)) return;
    publish(active.filter((toast) => toast.id !== id));
  };

  return {
    notify(message, tone = "info") {
      const createdAtMs = now();
      sequence += 1;
      const toast: Toast = { id: `toast-${sequence}`, message, tone, createdAtMs, expiresAtMs: createdAtMs + ttlMs };
      timers.set(
        toast.id,
        setTimeout(() => {
          timers.delete(toast.id);
          dismiss(toast.id);
        }, ttlMs)
      );
      publish([...active, toast]);
      return toast;
    },
    dismiss,
    clear() {
      timers.forEach((timer) => clearTimeout(timer));
      timers.clear();
      if (active.length > 0) publish([]);
    },
    getActive: () => active,
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
}
