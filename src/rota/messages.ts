export const groupReminderText = (mention: string, taskName: string) =>
  `${mention} 🔔\n\nIt's your turn for ${taskName}!\n\nPlease use /skip to pass to the next person.`;

export const directReminderText = (name: string, taskName: string) =>
  `Hello ${name}! 🔔\n\nIt's your turn for ${taskName}!\n\nPlease use /skip to pass to the next person.`;

export const weekSkippedText = (taskName: string) =>
  `📋 This week's ${taskName} has been skipped as requested. Normal schedule will resume next week.`;
