// Jest setup file: debug output stays off unless a test turns it on

import { DEBUG_GLOBAL } from "@/utils/debug";

delete process.env["PILEFALL_DEBUG"];
delete process.env["PILEFALL_SETTINGS"];
Reflect.deleteProperty(globalThis, DEBUG_GLOBAL);
