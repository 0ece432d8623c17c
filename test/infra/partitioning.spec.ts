import { murmurHash3, partitionFor } from "../../src/infra/queue/partitioning";

describe("partitioning", () => {
  it("matches reference murmur3 values", () => {
    expect(murmurHash3("")).toBe(0);
    expect(murmurHash3("hello")).toBe(613153351);
  });

  it("pins a conversation to one partition", () => {
    const first = partitionFor("conv-42", 16);
    for (let i = 0; i < 10; i++) {
      expect(partitionFor("conv-42", 16)).toBe(first);
    }
  });

  it("stays within range", () => {
    for (let i = 0; i < 200; i++) {
      const partition = partitionFor(`conversation-${i}`, 7);
      expect(partition).toBeGreaterThanOrEqual(0);
      expect(partition).toBeLessThan(7);
    }
  });

  it("spreads keys over several partitions", () => {
    const used = new Set<number>();
    for (let i = 0; i < 100; i++) {
      used.add(partitionFor(`conversation-${i}`, 4));
    }
    expect(used.size).toBe(4);
  });
});
