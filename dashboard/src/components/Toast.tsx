/**
 * Toast notification for voice errors and notices.
 *
 * Renders a fixed-position notification in the bottom-right corner
 * that auto-dismisses after a timeout.
 *
 * Usage:
 *   const [toast, setToast] = useState<string | null>(null);
 *   <Toast message={toast} variant="error" onDismiss={() => setToast(null)} />
 */

import { useEffect } from "react";

type ToastVariant = "info" | "error";

interface ToastProps {
  message: string | null;
  onDismiss: () => void;
  variant?: ToastVariant;
  /** Auto-dismiss timeout in ms. Default: 6000 */
  timeout?: number;
}

export function Toast({ message, onDismiss, variant = "info", timeout = 6000 }: ToastProps) {
  useEffect(() => {
    if (!message) return;
    const timer = setTimeout(onDismiss, timeout);
    return () => clearTimeout(timer);
  }, [message, onDismiss, timeout]);

  if (!message) return null;

  return (
    <div className={`toast toast-${variant}`} role={variant === "error" ? "alert" : "status"}>
      <span>{message}</span>
      <button className="toast-close" aria-label="Dismiss" onClick={onDismiss}>&times;</button>
    </div>
  );
}
