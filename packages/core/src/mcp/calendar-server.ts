/**
 * Calendar MCP Server
 *
 * Exposes CalendarRepository operations as MCP tools via the Agent SDK's
 * createSdkMcpServer pattern. Results are pretty-printed JSON; failures come
 * back as tool results with `isError` and an `{ error, code }` body.
 *
 * @module mcp/calendar-server
 */

import { tool, createSdkMcpServer } from '@anthropic-ai/claude-agent-sdk'
import { z } from 'zod'
import { pino } from 'pino'
import { ConfigurationError, isCalendarError } from '../calendar/errors.js'
import type {
  CalendarRepository,
  RecurrenceInput,
  ReminderInput,
} from '../calendar/types.js'
import { toEventRecord } from './records.js'
import type { CalendarServerDeps } from './types.js'

type ToolResult = {
  content: Array<{ type: 'text'; text: string }>
  isError?: boolean
}

const calendarIndex = z
  .number()
  .int()
  .default(0)
  .describe('Calendar index from list_calendars (default: 0)')

const reminderSchema = z.object({
  minutes_before: z.number().optional().describe('Minutes before start (default: 15)'),
  action: z.string().optional().describe('DISPLAY, EMAIL or AUDIO (default: DISPLAY)'),
  description: z.string().optional().describe('Reminder text (default: event title)'),
  email_to: z.string().optional().describe('Recipient for EMAIL reminders'),
})

const attendeeSchema = z.union([
  z.string().describe('Attendee email'),
  z.object({
    email: z.string(),
    status: z
      .string()
      .optional()
      .describe('ACCEPTED, DECLINED, TENTATIVE or NEEDS-ACTION (default: NEEDS-ACTION)'),
    name: z.string().optional().describe('Display name'),
  }),
])

const recurrenceSchema = z.object({
  frequency: z.string().describe('DAILY, WEEKLY, MONTHLY or YEARLY'),
  interval: z.number().optional().describe('Repeat every N periods'),
  count: z.number().optional().describe('Number of occurrences'),
  until: z.string().optional().describe('Last date, ISO 8601'),
  by_day: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .describe('Weekdays, e.g. "MO,WE,FR" or ["MO", "-1FR"]'),
  by_month_day: z
    .union([z.number(), z.array(z.number())])
    .optional()
    .describe('Days of the month (1..31, -31..-1)'),
  by_month: z
    .union([z.number(), z.array(z.number())])
    .optional()
    .describe('Months (1..12)'),
})

const searchField = z.enum(['title', 'description', 'location', 'attendees'])

function toReminderInput(reminder: z.infer<typeof reminderSchema>): ReminderInput {
  return {
    minutesBefore: reminder.minutes_before,
    action: reminder.action,
    description: reminder.description,
    emailTo: reminder.email_to,
  }
}

function toRecurrenceInput(recurrence: z.infer<typeof recurrenceSchema>): RecurrenceInput {
  return {
    frequency: recurrence.frequency,
    interval: recurrence.interval,
    count: recurrence.count,
    until: recurrence.until,
    byDay: recurrence.by_day,
    byMonthDay: recurrence.by_month_day,
    byMonth: recurrence.by_month,
  }
}

function jsonResult(value: unknown): ToolResult {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
  }
}

function errorResult(err: unknown): ToolResult {
  const body = isCalendarError(err)
    ? { error: err.message, code: err.code }
    : { error: err instanceof Error ? err.message : String(err), code: 'INTERNAL_ERROR' }
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(body, null, 2) }],
    isError: true,
  }
}

export function createCalendarServer(deps: CalendarServerDeps) {
  const logger = (deps.logger ?? pino({ level: 'silent' })).child({ component: 'tools' })

  async function run(
    name: string,
    action: (repository: CalendarRepository) => Promise<unknown>,
  ): Promise<ToolResult> {
    try {
      if (deps.repository instanceof ConfigurationError) {
        throw deps.repository
      }
      return jsonResult(await action(deps.repository))
    } catch (err) {
      logger.error(
        { tool: name, code: isCalendarError(err) ? err.code : 'INTERNAL_ERROR' },
        err instanceof Error ? err.message : String(err),
      )
      return errorResult(err)
    }
  }

  const listCalendarsTool = tool(
    'list_calendars',
    'List the calendars available on the CalDAV account, with the index to pass as calendar_index to the other tools.',
    {},
    async () => run('list_calendars', (repository) => repository.listCalendars()),
  )

  const createEventTool = tool(
    'create_event',
    'Create a calendar event. Defaults to tomorrow at 14:00 for one hour. A date-only start_time (YYYY-MM-DD) creates an all-day event.',
    {
      title: z.string().describe('Event title'),
      description: z.string().optional().describe('Event description'),
      location: z.string().optional().describe('Event location'),
      start_time: z
        .string()
        .optional()
        .describe('Start, ISO 8601 (e.g. "2025-01-20T09:00:00" or "2025-01-20")'),
      end_time: z.string().optional().describe('End, ISO 8601'),
      duration_hours: z
        .number()
        .optional()
        .describe('Duration when end_time is omitted (default: 1)'),
      reminders: z.array(reminderSchema).optional().describe('Reminders (VALARM)'),
      attendees: z.array(attendeeSchema).optional().describe('Attendees by email'),
      calendar_index: calendarIndex,
      categories: z.array(z.string()).optional().describe('Tags'),
      priority: z.number().optional().describe('0 (none), 1 (highest) to 9 (lowest)'),
      recurrence: recurrenceSchema.optional().describe('Recurrence rule'),
      status: z.string().optional().describe('CONFIRMED, TENTATIVE or CANCELLED'),
    },
    async (args) =>
      run('create_event', async (repository) => {
        const created = await repository.createEvent(
          {
            title: args.title,
            description: args.description,
            location: args.location,
            start: args.start_time,
            end: args.end_time,
            durationHours: args.duration_hours,
            reminders: args.reminders?.map(toReminderInput),
            attendees: args.attendees,
            categories: args.categories,
            priority: args.priority,
            recurrence: args.recurrence ? toRecurrenceInput(args.recurrence) : undefined,
            status: args.status,
          },
          args.calendar_index,
        )
        return {
          ...toEventRecord(created.event),
          calendar_index: created.calendarIndex,
          calendar: created.calendar,
        }
      }),
  )

  const getEventsTool = tool(
    'get_events',
    'List events overlapping a time window. Defaults to the next 7 days from today 00:00; end_date is exclusive.',
    {
      calendar_index: calendarIndex,
      start_date: z.string().optional().describe('Window start, ISO 8601 (default: today)'),
      end_date: z
        .string()
        .optional()
        .describe('Window end, ISO 8601, exclusive (default: start + 7 days)'),
      include_all_day: z.boolean().default(true).describe('Include all-day events'),
    },
    async (args) =>
      run('get_events', async (repository) => {
        const events = await repository.getEvents({
          calendarIndex: args.calendar_index,
          start: args.start_date,
          end: args.end_date,
          includeAllDay: args.include_all_day,
        })
        return events.map(toEventRecord)
      }),
  )

  const getTodayEventsTool = tool(
    'get_today_events',
    "List today's events.",
    { calendar_index: calendarIndex },
    async (args) =>
      run('get_today_events', async (repository) =>
        (await repository.getTodayEvents(args.calendar_index)).map(toEventRecord),
      ),
  )

  const getWeekEventsTool = tool(
    'get_week_events',
    "List this week's events: the next 7 days from today, or from Monday when start_from_today is false.",
    {
      calendar_index: calendarIndex,
      start_from_today: z
        .boolean()
        .default(true)
        .describe('Start today (true) or on Monday of the current week (false)'),
    },
    async (args) =>
      run('get_week_events', async (repository) =>
        (await repository.getWeekEvents(args.calendar_index, args.start_from_today)).map(
          toEventRecord,
        ),
      ),
  )

  const getEventByUidTool = tool(
    'get_event_by_uid',
    'Fetch a single event by UID. Only events within one year of today can be found.',
    {
      uid: z.string().describe('Event UID'),
      calendar_index: calendarIndex,
    },
    async (args) =>
      run('get_event_by_uid', async (repository) =>
        toEventRecord(await repository.getEventByUid(args.uid, args.calendar_index)),
      ),
  )

  const deleteEventTool = tool(
    'delete_event',
    'Delete an event by UID.',
    {
      uid: z.string().describe('Event UID'),
      calendar_index: calendarIndex,
    },
    async (args) =>
      run('delete_event', async (repository) => {
        const deleted = await repository.deleteEvent(args.uid, args.calendar_index)
        return {
          success: true,
          uid: deleted.uid,
          calendar_index: deleted.calendarIndex,
          message: 'Event deleted successfully',
        }
      }),
  )

  const updateEventTool = tool(
    'update_event',
    'Update an event by UID. Only the fields given change; an empty description or location clears it; recurrence null removes the rule.',
    {
      uid: z.string().describe('Event UID'),
      calendar_index: calendarIndex,
      title: z.string().optional().describe('New title'),
      description: z.string().optional().describe('New description ("" clears)'),
      location: z.string().optional().describe('New location ("" clears)'),
      start: z.string().optional().describe('New start, ISO 8601'),
      end: z.string().optional().describe('New end, ISO 8601'),
      categories: z.array(z.string()).optional().describe('Replacement tags'),
      priority: z.number().optional().describe('0 (none), 1 (highest) to 9 (lowest)'),
      attendees: z.array(attendeeSchema).optional().describe('Replacement attendee list'),
      reminders: z.array(reminderSchema).optional().describe('Replacement reminders'),
      recurrence: recurrenceSchema.nullable().optional().describe('New rule, or null to remove'),
      status: z.string().optional().describe('CONFIRMED, TENTATIVE or CANCELLED'),
    },
    async (args) =>
      run('update_event', async (repository) => {
        const recurrence =
          args.recurrence === null
            ? null
            : args.recurrence
              ? toRecurrenceInput(args.recurrence)
              : undefined
        const updated = await repository.updateEvent(
          args.uid,
          {
            title: args.title,
            description: args.description,
            location: args.location,
            start: args.start,
            end: args.end,
            categories: args.categories,
            priority: args.priority,
            attendees: args.attendees,
            reminders: args.reminders?.map(toReminderInput),
            recurrence,
            status: args.status,
          },
          args.calendar_index,
        )
        return toEventRecord(updated)
      }),
  )

  const searchEventsTool = tool(
    'search_events',
    'Search events in a window by case-insensitive substring over title, description, location and attendee emails. Both dates are required.',
    {
      query: z.string().describe('Text to look for'),
      start_date: z.string().describe('Window start, ISO 8601'),
      end_date: z.string().describe('Window end, ISO 8601, exclusive'),
      calendar_index: calendarIndex,
      search_fields: z
        .array(searchField)
        .optional()
        .describe('Fields to search (default: all)'),
    },
    async (args) =>
      run('search_events', async (repository) => {
        const events = await repository.searchEvents({
          query: args.query,
          start: args.start_date,
          end: args.end_date,
          calendarIndex: args.calendar_index,
          fields: args.search_fields,
        })
        return events.map(toEventRecord)
      }),
  )

  return createSdkMcpServer({
    name: 'calendar',
    version: deps.version,
    tools: [
      listCalendarsTool,
      createEventTool,
      getEventsTool,
      getTodayEventsTool,
      getWeekEventsTool,
      getEventByUidTool,
      deleteEventTool,
      updateEventTool,
      searchEventsTool,
    ],
  })
}
