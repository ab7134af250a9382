/**
 * @glucolog/diabetes - Events
 *
 * Event creation, flattening, and rehydration
 */

export { systemClock, fixedClock, randomId, type Clock, type IdGenerator } from "./clock.js";

export {
  createFoodEvent,
  createInsulinEvent,
  createExerciseEvent,
  createNoteEvent,
  type CreationContext,
  type Created,
  type CreateFoodEventInput,
  type CreateInsulinEventInput,
  type CreateExerciseEventInput,
  type CreateNoteEventInput,
} from "./create.js";

export {
  toSnapshot,
  foodSnapshot,
  insulinSnapshot,
  exerciseSnapshot,
  noteSnapshot,
  rehydrateEvent,
} from "./snapshot.js";
