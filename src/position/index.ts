export { type PositionKey, encodePositionKey, positionId } from "./position-identity.js";
