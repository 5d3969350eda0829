import { spinner } from "@clack/prompts"
import { consola } from "consola"
import {
	formatNotification,
	type Notification,
	type NotificationSink,
	notificationLevel,
} from "../core/notifications.js"

/**
 * Renders core notifications on the terminal. Download progress is shown on
 * a spinner; everything else goes through consola at the event's level.
 */
export class TerminalSink implements NotificationSink {
	private progress: ReturnType<typeof spinner> | null = null
	private total = 0
	private received = 0

	onEvent(notification: Notification): void {
		switch (notification.type) {
			case "download_content_length":
				this.total = notification.bytes
				this.received = 0
				this.progress = spinner()
				this.progress.start(`Downloading (${formatBytes(this.total)})`)
				return
			case "download_data_received":
				this.received += notification.bytes
				this.progress?.message(
					`Downloading ${formatBytes(this.received)} / ${formatBytes(this.total)}`,
				)
				return
			case "download_finished":
				this.progress?.stop("Download finished.")
				this.progress = null
				return
			default:
				consola[notificationLevel(notification)](formatNotification(notification))
		}
	}
}

export function formatBytes(bytes: number): string {
	const units = ["B", "KiB", "MiB", "GiB"]
	let value = bytes
	let unit = 0
	while (value >= 1024 && unit < units.length - 1) {
		value /= 1024
		unit += 1
	}
	return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`
}
