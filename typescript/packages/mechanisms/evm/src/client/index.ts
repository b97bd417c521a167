export { signEip2612Permit, signEip2612PermitMessage } from "./eip2612";
