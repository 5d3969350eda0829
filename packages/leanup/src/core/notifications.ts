/**
 * Typed events emitted by the core while it works. The presentation layer
 * decides how (and whether) to render them by implementing NotificationSink.
 */

export type NotificationLevel = "debug" | "info" | "warn" | "error"

export type Notification =
	| { type: "set_default_toolchain"; toolchain: string }
	| { type: "set_override_toolchain"; path: string; toolchain: string }
	| { type: "removed_override"; path: string }
	| { type: "looking_for_toolchain"; toolchain: string }
	| { type: "installing_toolchain"; toolchain: string }
	| { type: "installed_toolchain"; toolchain: string }
	| { type: "using_existing_toolchain"; toolchain: string }
	| { type: "uninstalling_toolchain"; toolchain: string }
	| { type: "uninstalled_toolchain"; toolchain: string }
	| { type: "toolchain_not_installed"; toolchain: string }
	| { type: "using_existing_release"; toolchain: string }
	| { type: "unresolved_toolchain"; label: string; reason: string; toolchain: string }
	| { type: "resolving_channel"; origin: string; channel: string }
	| { type: "resolved_channel"; channel: string; release: string }
	| { type: "downloading_component"; url: string }
	| { type: "download_content_length"; bytes: number }
	| { type: "download_data_received"; bytes: number }
	| { type: "download_finished" }
	| { type: "extracting"; archive: string; destination: string }
	| { type: "installing_component"; toolchain: string; platform: string }
	| { type: "waiting_for_file_lock"; path: string; pid: string }
	| { type: "no_canonical_path"; path: string }
	| { type: "linking_directory"; source: string; destination: string }
	| { type: "copying_directory"; source: string; destination: string }
	| { type: "removing_directory"; path: string }
	| { type: "recorded_project_root"; path: string }

export interface NotificationSink {
	onEvent(notification: Notification): void
}

export const silentSink: NotificationSink = {
	onEvent: () => {},
}

/**
 * Sink that stores every event; used by tests and the JSON state dump.
 */
export class RecordingSink implements NotificationSink {
	readonly events: Notification[] = []

	onEvent(notification: Notification): void {
		this.events.push(notification)
	}

	ofType<K extends Notification["type"]>(
		type: K,
	): Extract<Notification, { type: K }>[] {
		return this.events.filter(
			(event): event is Extract<Notification, { type: K }> => event.type === type,
		)
	}
}

export function notificationLevel(notification: Notification): NotificationLevel {
	switch (notification.type) {
		case "download_content_length":
		case "download_data_received":
		case "download_finished":
		case "extracting":
		case "looking_for_toolchain":
		case "resolving_channel":
		case "resolved_channel":
		case "linking_directory":
		case "copying_directory":
		case "removing_directory":
		case "recorded_project_root":
		case "downloading_component":
			return "debug"
		case "set_default_toolchain":
		case "set_override_toolchain":
		case "removed_override":
		case "installing_toolchain":
		case "installed_toolchain":
		case "using_existing_toolchain":
		case "uninstalling_toolchain":
		case "uninstalled_toolchain":
		case "installing_component":
		case "waiting_for_file_lock":
			return "info"
		case "toolchain_not_installed":
		case "using_existing_release":
		case "unresolved_toolchain":
		case "no_canonical_path":
			return "warn"
	}
}

export function formatNotification(notification: Notification): string {
	switch (notification.type) {
		case "set_default_toolchain":
			return `default toolchain set to '${notification.toolchain}'`
		case "set_override_toolchain":
			return `override toolchain for '${notification.path}' set to '${notification.toolchain}'`
		case "removed_override":
			return `override toolchain for '${notification.path}' removed`
		case "looking_for_toolchain":
			return `looking for installed toolchain '${notification.toolchain}'`
		case "installing_toolchain":
			return `installing toolchain '${notification.toolchain}'`
		case "installed_toolchain":
			return `toolchain '${notification.toolchain}' installed`
		case "using_existing_toolchain":
			return `using existing install for '${notification.toolchain}'`
		case "uninstalling_toolchain":
			return `uninstalling toolchain '${notification.toolchain}'`
		case "uninstalled_toolchain":
			return `toolchain '${notification.toolchain}' uninstalled`
		case "toolchain_not_installed":
			return `no toolchain installed for '${notification.toolchain}'`
		case "using_existing_release":
			return `failed to query latest release, using existing version '${notification.toolchain}'`
		case "unresolved_toolchain":
			return `could not resolve ${notification.label} '${notification.toolchain}', not counting it as used: ${notification.reason}`
		case "resolving_channel":
			return `resolving channel '${notification.channel}' for '${notification.origin}'`
		case "resolved_channel":
			return `channel '${notification.channel}' resolved to '${notification.release}'`
		case "downloading_component":
			return `downloading ${notification.url}`
		case "download_content_length":
			return `download size is ${notification.bytes} bytes`
		case "download_data_received":
			return `received ${notification.bytes} bytes`
		case "download_finished":
			return "download finished"
		case "extracting":
			return `extracting ${notification.archive} to ${notification.destination}`
		case "installing_component":
			return `installing ${notification.toolchain} for ${notification.platform}`
		case "waiting_for_file_lock":
			return `waiting for previous installation request to finish (${notification.path}, held by PID ${notification.pid})`
		case "no_canonical_path":
			return `could not canonicalize path: '${notification.path}'`
		case "linking_directory":
			return `linking directory from: '${notification.source}'`
		case "copying_directory":
			return `copying directory from: '${notification.source}'`
		case "removing_directory":
			return `removing directory: '${notification.path}'`
		case "recorded_project_root":
			return `recorded project root '${notification.path}'`
	}
}
