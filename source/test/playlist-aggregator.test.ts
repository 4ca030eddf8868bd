import { describe, expect, it } from "vitest";
import { PlaylistAggregator } from "../core/playlist-aggregator.js";

describe("PlaylistAggregator", () => {
	it.each([undefined, 0, -1, 2.5])("defaults %j items to 1", (count) => {
		expect(new PlaylistAggregator(count).total).toBe(1);
	});

	it("counts duplicate finished signals once", () => {
		const aggregator = new PlaylistAggregator(3);

		expect(aggregator.markItemFinished("#1")).toBe(true);
		expect(aggregator.markItemFinished("#1")).toBe(false);
		expect(aggregator.markItemFinished("#1")).toBe(false);

		expect(aggregator.completed).toBe(1);
	});

	it("never counts past the total", () => {
		const aggregator = new PlaylistAggregator(2);
		aggregator.markItemFinished("a");
		aggregator.markItemFinished("b");
		aggregator.markItemFinished("c");

		expect(aggregator.completed).toBe(2);
		expect(aggregator.isComplete).toBe(true);
	});

	it("reports the item percent without blending", () => {
		const aggregator = new PlaylistAggregator(3);
		aggregator.markItemFinished("#1");

		expect(aggregator.view(30)).toEqual({ current: 1, total: 3, percent: 30 });
	});

	it("completes the remaining items", () => {
		const aggregator = new PlaylistAggregator(4);
		aggregator.completeRemaining();

		expect(aggregator.view(100)).toEqual({ current: 4, total: 4, percent: 100 });
	});
});
