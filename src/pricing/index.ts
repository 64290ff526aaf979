export { estimateCost, validatePricing } from "./cost-estimator";
