export { SystemClock } from "./SystemClock";
export { MathRandom } from "./MathRandom";
