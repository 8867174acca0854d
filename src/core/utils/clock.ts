/** Current time as whole unix seconds, the resolution the history store keeps. */
export function toUnixSeconds(date: Date = new Date()): number {
    return Math.floor(date.getTime() / 1000);
}
