export { Domain, type Domains } from "./domain";
export { DomainRegistry, type DomainHandle } from "./registry";
export { EMPTY_STATS, foldLatency, type LatencyStats } from "./statistics";
