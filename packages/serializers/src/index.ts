export { Unicode } from "./unicode";
