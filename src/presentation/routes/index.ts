export { type Router, type RouterOptions, createRouter } from "./router.js";
