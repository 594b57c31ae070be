export { SECURITY_HEADERS, securityHeaders } from "./security-headers.js";
