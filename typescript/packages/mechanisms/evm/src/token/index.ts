export { IndieTreatToken } from "./indieTreatToken";
