const pad = (value: number): string => value.toString().padStart(2, "0");

const easternFormat = new Intl.DateTimeFormat("en-US", {
    timeZone: "America/New_York",
    weekday: "short",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
});

export interface EasternClock {
    weekday: string;
    hours: number;
    minutes: number;
}

export default new class Time {
    getCurrentETTime(now: Date = new Date()): EasternClock {
    const parts = easternFormat.formatToParts(now);
    const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "";
    return {
        weekday: part("weekday"),
        hours: Number(part("hour")),
        minutes: Number(part("minute")),
    };
    };

    //US regular session, 09:30-16:00 ET on weekdays. Holidays are not tracked.
    isMarketOpen = (now: Date = new Date()): boolean => {
    const et = this.getCurrentETTime(now);
    if (et.weekday === "Sat" || et.weekday === "Sun") return false;

    const minutes = et.hours * 60 + et.minutes;
    return minutes >= 9 * 60 + 30 && minutes < 16 * 60;
    };

    // YYYY-MM-DD HH:mm:ss in local time, the format the quote API takes for date ranges
    formatTimestamp(date: Date): string {
    return (
        `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
    );
    };

    ageSeconds(timestamp: Date, now: Date): number {
    return (now.getTime() - timestamp.getTime()) / 1000;
    };

    sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
    };
}
