/** Greeting for `user` at the given hour of the day (0-23). */
export function greet(user: string, hour: number): string {
  if (hour === 23) {
    return `Night's become. Civilians lie down to sleep and the mafia wakes up. Beware, ${user}...`;
  }
  if (hour <= 6) return `Good night, ${user}!`;
  if (hour <= 9) return `Good morning, ${user}!`;
  if (hour <= 16) return `Good afternoon, ${user}!`;
  return `Good evening, ${user}!`;
}
