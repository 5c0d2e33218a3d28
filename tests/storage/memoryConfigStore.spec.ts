import { MemoryConfigStore } from "../../src/storage/MemoryConfigStore";

describe("MemoryConfigStore", () => {
  it("seeds, reads and overwrites", async () => {
    const store = new MemoryConfigStore({ a: "1" });
    await expect(store.get("a")).resolves.toBe("1");
    await expect(store.get("b")).resolves.toBeNull();
    await store.set("a", "2");
    expect(store.snapshot()).toEqual({ a: "2" });
  });
});
