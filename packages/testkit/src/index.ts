/**
 * Test helpers for recordkit
 */

export { createTempDir, removeDir, withTempDir, writeFixtures } from "./fs.js";
export { captureIO, type CapturedIO, type CliCapture } from "./cli.js";
export { ProductType, CustomerType, shopData } from "./shop.js";
