export { createTempDir, removeDir, writeJsonFile, withTempDir } from "./fs.js";
export { SeededRandom, randomSequence } from "./random.js";
