import { createSubsystemLogger } from "./logging/subsystem.js";

let globalVerbose = process.env.FINSIGHT_VERBOSE === "1";

const verboseLog = createSubsystemLogger("verbose");

export function setVerbose(v: boolean) {
  globalVerbose = v;
}

export function shouldLogVerbose() {
  return globalVerbose;
}

export function logVerbose(message: string) {
  if (!globalVerbose) {
    return;
  }
  verboseLog.debug(message);
}
