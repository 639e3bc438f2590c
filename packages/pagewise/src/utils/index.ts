export { generateId } from "./id";
