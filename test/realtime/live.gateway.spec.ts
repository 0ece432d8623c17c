import { resetEnvironmentCacheForTests } from "../../src/config/environment";
import { allowLiveOrigins } from "../../src/realtime/live.gateway";

describe("allowLiveOrigins", () => {
  const previous = process.env.CORS_ORIGINS;

  afterEach(() => {
    if (previous === undefined) {
      delete process.env.CORS_ORIGINS;
    } else {
      process.env.CORS_ORIGINS = previous;
    }
    resetEnvironmentCacheForTests();
  });

  it("allows the origins configured for the HTTP routes", () => {
    process.env.CORS_ORIGINS = "https://ops.example.test";
    resetEnvironmentCacheForTests();
    const callback = jest.fn();

    allowLiveOrigins("https://ops.example.test", callback);

    expect(callback).toHaveBeenCalledWith(null, ["https://ops.example.test"]);
  });
});
