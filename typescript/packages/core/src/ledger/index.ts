export { PurchaseLedger } from "./purchaseLedger";
