export { TransitionTable } from "./transition-table.js";
