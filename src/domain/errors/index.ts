export { InboundMessageError } from "./InboundMessageError.js";
export { InvalidRoomStateError } from "./InvalidRoomStateError.js";
export { PlayerNotInRoomError } from "./PlayerNotInRoomError.js";
export { RoomCommandInputError } from "./RoomCommandInputError.js";
export { RoomFullError } from "./RoomFullError.js";
export { RoomNotFoundError } from "./RoomNotFoundError.js";
