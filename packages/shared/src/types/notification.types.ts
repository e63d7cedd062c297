/**
 * Notification priorities, ordered from least to most intrusive
 */
export type NotificationPriority = 'low' | 'normal' | 'high'

/**
 * Direction of a device set change
 */
export type ChangeDirection = 'added' | 'removed'

/**
 * Notification handed to a sink
 *
 * A notification posted with an identity that is still outstanding replaces
 * the previous one.
 */
export interface NotificationRequest {
  id: string
  title: string
  body: string
  priority: NotificationPriority
  error: boolean
}
