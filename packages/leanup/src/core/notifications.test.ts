import { describe, expect, it } from "vitest"
import { formatNotification, notificationLevel, RecordingSink } from "./notifications.js"

describe("formatNotification", () => {
	it("renders the cache fallback warning", () => {
		const notification = {
			toolchain: "leanprover/lean4-nightly:nightly-2023-09-06",
			type: "using_existing_release",
		} as const

		expect(formatNotification(notification)).toBe(
			"failed to query latest release, using existing version 'leanprover/lean4-nightly:nightly-2023-09-06'",
		)
		expect(notificationLevel(notification)).toBe("warn")
	})

	it("names the lock holder while waiting", () => {
		const notification = {
			path: "/home/u/.leanup/toolchains/leanprover--lean4---v4.9.0.lock",
			pid: "4242",
			type: "waiting_for_file_lock",
		} as const

		expect(formatNotification(notification)).toBe(
			"waiting for previous installation request to finish (/home/u/.leanup/toolchains/leanprover--lean4---v4.9.0.lock, held by PID 4242)",
		)
		expect(notificationLevel(notification)).toBe("info")
	})

	it("keeps download progress at debug level", () => {
		expect(notificationLevel({ bytes: 10, type: "download_data_received" })).toBe("debug")
	})
})

describe("RecordingSink", () => {
	it("filters recorded events by type", () => {
		const sink = new RecordingSink()
		sink.onEvent({ type: "download_finished" })
		sink.onEvent({ toolchain: "stable", type: "installed_toolchain" })

		expect(sink.ofType("installed_toolchain")).toEqual([
			{ toolchain: "stable", type: "installed_toolchain" },
		])
		expect(sink.events).toHaveLength(2)
	})
})
