import {
  DEFAULT_SETTINGS,
  STORAGE_KEY,
  envSettingsStore,
  loadSettings,
  parseSettings,
} from "../../src/app/settings";
import { DEBUG_GLOBAL } from "../../src/utils/debug";

// Mock key/value store
const mockStore = {
  getItem: jest.fn<string | null, [string]>(),
};

describe("settings loading", () => {
  beforeEach(() => {
    mockStore.getItem.mockReset();
  });

  it("reads the document stored under the settings key", () => {
    mockStore.getItem.mockReturnValue(
      JSON.stringify({ board: { height: 24, width: 12 } }),
    );

    const s = loadSettings(mockStore);
    expect(mockStore.getItem).toHaveBeenCalledWith(STORAGE_KEY);
    expect(s.board).toEqual({ height: 24, width: 12 });
  });

  it("falls back to defaults when nothing is stored", () => {
    mockStore.getItem.mockReturnValue(null);
    expect(loadSettings(mockStore)).toBe(DEFAULT_SETTINGS);
    expect(DEFAULT_SETTINGS.board).toEqual({ height: 20, width: 10 });
  });

  it("ignores malformed JSON and logs it under the settings topic", () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => {
      // silence
    });
    Reflect.set(globalThis, DEBUG_GLOBAL, { settings: true });
    mockStore.getItem.mockReturnValue("{not json");

    expect(loadSettings(mockStore)).toBe(DEFAULT_SETTINGS);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toBe(
      "[DBG:settings] ignoring malformed settings JSON",
    );

    Reflect.deleteProperty(globalThis, DEBUG_GLOBAL);
    warn.mockRestore();
  });

  it("clamps dimensions and drops non-integer fields", () => {
    expect(parseSettings({ board: { height: 1000, width: 1 } }).board).toEqual({
      height: 128,
      width: 4,
    });
    expect(parseSettings({ board: { height: "30", width: 8.5 } }).board).toEqual(
      { height: 20, width: 10 },
    );
    expect(parseSettings([]).board).toEqual({ height: 20, width: 10 });
    expect(parseSettings("board").board).toEqual({ height: 20, width: 10 });
  });

  it("env store serves PILEFALL_SETTINGS under the settings key only", () => {
    const store = envSettingsStore({ PILEFALL_SETTINGS: '{"board":{"width":6}}' });
    expect(store.getItem(STORAGE_KEY)).toBe('{"board":{"width":6}}');
    expect(store.getItem("other")).toBeNull();
    expect(loadSettings(store).board).toEqual({ height: 20, width: 6 });
  });

  it("env store defaults to process.env", () => {
    process.env["PILEFALL_SETTINGS"] = JSON.stringify({ board: { height: 8 } });
    try {
      expect(loadSettings().board).toEqual({ height: 8, width: 10 });
    } finally {
      delete process.env["PILEFALL_SETTINGS"];
    }
  });
});
