export { Checkout } from "./checkout";
export { NativeCheckout } from "./nativeCheckout";
export { TokenCheckout } from "./tokenCheckout";
