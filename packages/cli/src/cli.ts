#!/usr/bin/env node
/**
 * Glucolog CLI
 */

import { config as loadEnv } from "dotenv";
import { program } from "commander";
import {
  ABSORPTION_HINTS,
  INSULIN_TYPES,
  INTENSITY_TYPES,
  assembleChart,
  computeOutcome,
  computeTimeInRange,
  createCarbohydrate,
  createExerciseDuration,
  createExerciseEvent,
  createExerciseTypeId,
  createFoodEvent,
  createInsulinDose,
  createInsulinEvent,
  createMealTagId,
  createNoteEvent,
  createNoteText,
  createOptionalNoteText,
  createQueryDependencies,
  createUserId,
  getEvent,
  listEvents,
  loadConfig,
  randomId,
  requireEventsTable,
  type AbsorptionHint,
  type Carbohydrate,
  type ChartRangeHours,
  type CreationContext,
  type DiabetesEvent,
  type EventCreatedRecord,
  type EventType,
  type ExerciseDuration,
  type ExerciseTypeId,
  type InsulinDose,
  type InsulinType,
  type IntensityType,
  type MealTagId,
  type NoteText,
  type QueryDependencies,
  type Result,
  type UserId,
} from "@glucolog/diabetes";
import { createDexcomGlucoseSource, loadDexcomConfig } from "@glucolog/dexcom";
import {
  oneOf,
  parseEventType,
  parseInteger,
  parseNumber,
  parseRange,
  parseTimestamp,
  requireValue,
} from "./args.js";
import {
  formatChart,
  formatError,
  formatEvent,
  formatHistory,
  formatOutcome,
  formatTimeInRange,
} from "./format.js";

// .env.local wins over .env; neither overrides the real environment
loadEnv({ path: ".env.local" });
loadEnv();

function setup(): QueryDependencies {
  const dexcom = loadDexcomConfig();
  const glucose = createDexcomGlucoseSource({
    region: dexcom.region,
    credentialsFor: () => dexcom.credentials,
  });
  return createQueryDependencies(loadConfig(), glucose);
}

/**
 * Dependencies for the log-* commands, which need a persistent store
 */
function setupForLogging(): QueryDependencies {
  requireEventsTable(loadConfig());
  return setup();
}

/**
 * Abort the running query on Ctrl-C
 */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());
  return controller.signal;
}

function print<T>(result: Result<T>, format: (value: T) => string[]): void {
  if (!result.ok) {
    console.error(formatError(result.error));
    process.exit(1);
  }
  for (const line of format(result.value)) console.log(line);
}

function parseUser(value: string): UserId {
  return requireValue(createUserId(value));
}

function creationContext(deps: QueryDependencies): CreationContext {
  const correlationId = randomId();
  return { clock: deps.clock, correlationId, causationId: correlationId };
}

/**
 * Store a newly created event and report it with its audit record
 */
async function save(
  deps: QueryDependencies,
  created: Result<{ event: DiabetesEvent; audit: EventCreatedRecord }>
): Promise<void> {
  if (!created.ok) {
    console.error(formatError(created.error));
    process.exit(1);
  }
  const { event, audit } = created.value;
  try {
    await deps.events.put(event);
  } catch (error) {
    console.error("Failed to store event:", error);
    process.exit(1);
  }
  console.log(`Logged ${event.eventType} event ${event.id}`);
  console.log(`  ${audit.name} ${audit.auditId}`);
}

interface UserOptions {
  user: UserId;
}

interface LogOptions extends UserOptions {
  at?: number;
  note?: NoteText | null;
}

program
  .name("glucolog")
  .description("Log diabetes events and analyse them against CGM readings")
  .version("0.1.0");

program
  .command("chart")
  .description("Glucose readings and logged events for the last N hours")
  .requiredOption("--user <id>", "User ID", parseUser)
  .option("--range <hours>", "1, 3, 5, 8, 12 or 24", parseRange, 3)
  .action(async (options: UserOptions & { range: ChartRangeHours }) => {
    const deps = setup();
    print(
      await assembleChart(deps, options.user, options.range, { signal: interruptSignal() }),
      formatChart
    );
  });

program
  .command("tir")
  .description("Time in range for the last N hours")
  .requiredOption("--user <id>", "User ID", parseUser)
  .option("--range <hours>", "1, 3, 5, 8, 12 or 24", parseRange, 24)
  .action(async (options: UserOptions & { range: ChartRangeHours }) => {
    const deps = setup();
    print(
      await computeTimeInRange(deps, options.user, options.range, { signal: interruptSignal() }),
      formatTimeInRange
    );
  });

program
  .command("outcome")
  .description("Glucose two hours after a food event")
  .argument("<eventId>", "Food event ID")
  .requiredOption("--user <id>", "User ID", parseUser)
  .action(async (eventId: string, options: UserOptions) => {
    const deps = setup();
    print(
      await computeOutcome(deps, eventId, options.user, { signal: interruptSignal() }),
      formatOutcome
    );
  });

program
  .command("history")
  .description("Logged events, newest first")
  .requiredOption("--user <id>", "User ID", parseUser)
  .option("--type <type>", "Food, Insulin, Exercise or Note", parseEventType)
  .option("--from <time>", "ISO date or Unix ms (default: 30 days before --to)", parseTimestamp)
  .option("--to <time>", "ISO date or Unix ms (default: now)", parseTimestamp)
  .option("--page <n>", "Page number", parseInteger, 1)
  .option("--page-size <n>", "Events per page (max 100)", parseInteger, 20)
  .action(
    async (
      options: UserOptions & { type?: EventType; from?: number; to?: number; page: number; pageSize: number }
    ) => {
      const deps = setup();
      print(
        await listEvents(
          deps,
          {
            userId: options.user,
            type: options.type,
            from: options.from,
            to: options.to,
            page: options.page,
            pageSize: options.pageSize,
          },
          { signal: interruptSignal() }
        ),
        formatHistory
      );
    }
  );

program
  .command("show")
  .description("Show one event")
  .argument("<eventId>", "Event ID")
  .requiredOption("--user <id>", "User ID", parseUser)
  .action(async (eventId: string, options: UserOptions) => {
    const deps = setup();
    print(await getEvent(deps, eventId, options.user, { signal: interruptSignal() }), formatEvent);
  });

const parseCarbs = (value: string) => requireValue(createCarbohydrate(parseInteger(value)));
const parseMealTag = (value: string) => requireValue(createMealTagId(parseInteger(value)));
const parseDose = (value: string) => requireValue(createInsulinDose(parseNumber(value)));
const parseDuration = (value: string) => requireValue(createExerciseDuration(parseInteger(value)));
const parseExerciseType = (value: string) => requireValue(createExerciseTypeId(parseInteger(value)));
const parseNote = (value: string) => requireValue(createOptionalNoteText(value));
const parseNoteText = (value: string) => requireValue(createNoteText(value));

program
  .command("log-food")
  .description("Log carbohydrates eaten")
  .requiredOption("--user <id>", "User ID", parseUser)
  .requiredOption("--carbs <grams>", "Carbohydrates, 0-300 g", parseCarbs)
  .requiredOption("--meal-tag <id>", "Meal tag ID", parseMealTag)
  .option("--absorption <hint>", ABSORPTION_HINTS.join(", "), oneOf(ABSORPTION_HINTS), "Normal")
  .option("--at <time>", "When it happened (default: now)", parseTimestamp)
  .option("--note <text>", "Optional note", parseNote)
  .action(
    async (
      options: LogOptions & { carbs: Carbohydrate; mealTag: MealTagId; absorption: AbsorptionHint }
    ) => {
      const deps = setupForLogging();
      await save(
        deps,
        createFoodEvent(
          {
            userId: options.user,
            eventTime: options.at ?? deps.clock.now(),
            carbohydrate: options.carbs,
            mealTagId: options.mealTag,
            absorptionHint: options.absorption,
            note: options.note,
          },
          creationContext(deps)
        )
      );
    }
  );

program
  .command("log-insulin")
  .description("Log an insulin dose")
  .requiredOption("--user <id>", "User ID", parseUser)
  .requiredOption("--units <units>", "Dose, 0-100 in 0.5 steps", parseDose)
  .requiredOption("--type <type>", INSULIN_TYPES.join(" or "), oneOf(INSULIN_TYPES))
  .option("--preparation <text>", "Preparation details, up to 200 characters")
  .option("--delivery <text>", "Delivery details, up to 200 characters")
  .option("--timing <text>", "Timing details, up to 200 characters")
  .option("--at <time>", "When it happened (default: now)", parseTimestamp)
  .option("--note <text>", "Optional note", parseNote)
  .action(
    async (
      options: LogOptions & {
        units: InsulinDose;
        type: InsulinType;
        preparation?: string;
        delivery?: string;
        timing?: string;
      }
    ) => {
      const deps = setupForLogging();
      await save(
        deps,
        createInsulinEvent(
          {
            userId: options.user,
            eventTime: options.at ?? deps.clock.now(),
            insulinType: options.type,
            dose: options.units,
            preparation: options.preparation,
            delivery: options.delivery,
            timing: options.timing,
            note: options.note,
          },
          creationContext(deps)
        )
      );
    }
  );

program
  .command("log-exercise")
  .description("Log exercise")
  .requiredOption("--user <id>", "User ID", parseUser)
  .requiredOption("--minutes <n>", "Duration, 1-300 minutes", parseDuration)
  .requiredOption("--exercise-type <id>", "Exercise type ID", parseExerciseType)
  .option("--intensity <level>", INTENSITY_TYPES.join(", "), oneOf(INTENSITY_TYPES), "Moderate")
  .option("--at <time>", "When it happened (default: now)", parseTimestamp)
  .option("--note <text>", "Optional note", parseNote)
  .action(
    async (
      options: LogOptions & {
        minutes: ExerciseDuration;
        exerciseType: ExerciseTypeId;
        intensity: IntensityType;
      }
    ) => {
      const deps = setupForLogging();
      await save(
        deps,
        createExerciseEvent(
          {
            userId: options.user,
            eventTime: options.at ?? deps.clock.now(),
            exerciseTypeId: options.exerciseType,
            duration: options.minutes,
            intensity: options.intensity,
            note: options.note,
          },
          creationContext(deps)
        )
      );
    }
  );

program
  .command("log-note")
  .description("Log a free-text note")
  .argument("<text>", "Note text, up to 500 characters", parseNoteText)
  .requiredOption("--user <id>", "User ID", parseUser)
  .option("--at <time>", "When it happened (default: now)", parseTimestamp)
  .action(async (text: NoteText, options: UserOptions & { at?: number }) => {
    const deps = setupForLogging();
    await save(
      deps,
      createNoteEvent(
        {
          userId: options.user,
          eventTime: options.at ?? deps.clock.now(),
          text,
        },
        creationContext(deps)
      )
    );
  });

try {
  await program.parseAsync();
} catch (error: unknown) {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
}
