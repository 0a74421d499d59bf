export { JsonFormatter } from "./json";
export { PrettyFormatter } from "./pretty";
