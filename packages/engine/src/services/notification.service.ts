/**
 * Notifications shown to the user
 * Hosts inject their own implementation (tooltips, toasts); the default
 * writes to the console.
 */
export interface Notifier {
  info(message: string): void;
  error(message: string, error?: unknown): void;
}

export class ConsoleNotifier implements Notifier {
  info(message: string): void {
    console.log(`[LeechActions] ${message}`);
  }

  error(message: string, error?: unknown): void {
    if (error) {
      console.error(`[LeechActions] ${message}:`, error);
    } else {
      console.error(`[LeechActions] ${message}`);
    }
  }
}
