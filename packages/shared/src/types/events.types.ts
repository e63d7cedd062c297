/**
 * Event as read from the admin event stream
 */
export interface AdminEvent {
  /** VM the event is about; null for global events */
  subject: string | null
  /** Event kind, e.g. `device-attach:usb` or `domain-start` */
  event: string
  /** Keyword payload */
  kwargs: Record<string, string>
}

/**
 * Handler registered on the events dispatcher
 */
export type AdminEventHandler = (event: AdminEvent) => void | Promise<void>
