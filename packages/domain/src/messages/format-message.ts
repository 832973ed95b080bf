import type { AgentRecord } from "../agents/agent-resolver";
import type { Availability } from "../availability/types";
import type { PropertyInfo } from "../pipeline/types";

const MAX_DATES = 5;
const MAX_TIMES_PER_DATE = 6;

function groupTimesByDate(availability: Availability): Map<string, string[]> {
  const byDate = new Map<string, string[]>();
  for (const slot of availability.slots) {
    const times = byDate.get(slot.date);
    if (times) times.push(slot.time);
    else byDate.set(slot.date, [slot.time]);
  }
  return byDate;
}

export function formatShowingMessage(property: PropertyInfo, agent: AgentRecord, availability: Availability): string {
  let msg = `🏠 PROPERTY: ${property.name}\n📍 ${property.address}, ${property.city}, ${property.state}\n\n`;
  msg += `👤 LEASING AGENT: ${agent.name}\n📧 Email: ${agent.email}\n\n`;

  if (availability.slots.length === 0) {
    msg += `📅 SHOWING AVAILABILITY:\nNo available time slots found in the next ${availability.daysChecked} days.\n`;
    msg += `${agent.name}'s calendar is fully booked.\n\n`;
    msg += `📞 Please contact ${agent.name} directly at ${agent.email} to schedule.`;
    return msg;
  }

  msg += "📅 AVAILABLE SHOWING TIMES:\n\n";

  const byDate = groupTimesByDate(availability);
  const dates = Array.from(byDate.keys());

  for (const date of dates.slice(0, MAX_DATES)) {
    const times = byDate.get(date) ?? [];
    msg += `${date}:\n`;
    for (const time of times.slice(0, MAX_TIMES_PER_DATE)) {
      msg += `  • ${time}\n`;
    }
    if (times.length > MAX_TIMES_PER_DATE) {
      msg += `  • ...${times.length - MAX_TIMES_PER_DATE} more times available\n`;
    }
    msg += "\n";
  }

  if (dates.length > MAX_DATES) {
    msg += `...and ${dates.length - MAX_DATES} more days with availability\n`;
  }

  msg += `\n📞 Contact ${agent.name} at ${agent.email} to schedule your showing.`;
  return msg;
}
