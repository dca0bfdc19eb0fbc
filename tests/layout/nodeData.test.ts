// tests/layout/nodeData.test.ts
import { NodeData } from "../../src/layout/core/nodeData.js";
import { ForestError } from "../../src/layout/errors.js";
import { emptyLayout } from "../../src/layout/interfaces.js";
import { makeStyle } from "../../src/layout/style.js";
import { fakeCache, forestErrorCode } from "../testUtils.js";

describe("NodeData", () => {
  it("starts dirty with an empty layout and no caches", () => {
    const data = NodeData.create(makeStyle());

    expect(data.isDirty).toBe(true);
    expect(data.measure).toBeUndefined();
    expect(data.layout).toEqual(emptyLayout());
    expect(data.mainSizeCache).toBeUndefined();
    expect(data.otherCache).toBeUndefined();
  });

  it("createWithMeasure keeps the measure function", () => {
    const measure = jest.fn(() => ({ width: 1, height: 1 }));
    const data = NodeData.createWithMeasure(makeStyle(), measure);

    expect(data.measure).toBe(measure);
    expect(data.isDirty).toBe(true);
    expect(measure).not.toHaveBeenCalled();
  });

  it("refuses to store a cache while dirty", () => {
    const data = NodeData.create(makeStyle());

    expect(() => data.storeCache("mainSize", fakeCache(1, 1))).toThrow(ForestError);
    expect(forestErrorCode(() => data.storeCache("other", fakeCache(1, 1)))).toBe("dirty-cache-write");
    expect(data.mainSizeCache).toBeUndefined();
    expect(data.otherCache).toBeUndefined();
  });

  it("stores the two cache slots independently once clean", () => {
    const data = NodeData.create(makeStyle());
    const main = fakeCache(3, 4);
    const other = fakeCache(5, 6);

    data.markClean();
    data.storeCache("mainSize", main);
    expect(data.cache("mainSize")).toBe(main);
    expect(data.cache("other")).toBeUndefined();

    data.storeCache("other", other);
    expect(data.mainSizeCache).toBe(main);
    expect(data.otherCache).toBe(other);
    expect(data.isDirty).toBe(false);
  });

  it("markDirty clears both caches together and is idempotent", () => {
    const data = NodeData.create(makeStyle());
    data.markClean();
    data.storeCache("mainSize", fakeCache(3, 4));
    data.storeCache("other", fakeCache(5, 6));

    data.markDirty();
    expect(data.isDirty).toBe(true);
    expect(data.mainSizeCache).toBeUndefined();
    expect(data.otherCache).toBeUndefined();

    data.markDirty();
    expect(data.isDirty).toBe(true);
    expect(data.mainSizeCache).toBeUndefined();
  });

  it("restyle swaps the style and dirties the record", () => {
    const data = NodeData.create(makeStyle());
    data.markClean();
    data.storeCache("mainSize", fakeCache(3, 4));

    data.restyle(makeStyle({ flexShrink: 0 }));

    expect(data.style.flexShrink).toBe(0);
    expect(data.isDirty).toBe(true);
    expect(data.mainSizeCache).toBeUndefined();
  });

  it("carries a forest error name and code", () => {
    const err = new ForestError("missing-edge", "edge 1 -> 2");
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("ForestError");
    expect(err.code).toBe("missing-edge");
    expect(err.message).toBe("edge 1 -> 2");
    expect(new ForestError("unknown-node").message).toBe("unknown-node");
  });
});
