export { createDevGraphs } from "./createDevGraphs";
