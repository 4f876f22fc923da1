export type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
    timestamp: number;
    message: string;
    level: LogLevel;
}

class DebugLogger {
    private logs: LogEntry[] = [];
    private maxLogs = 100;
    private listeners: ((entry: LogEntry) => void)[] = [];
    private echo = true;

    log(message: string, level: LogLevel = 'info') {
        const entry = { timestamp: Date.now(), message, level };
        this.logs.unshift(entry);
        if (this.logs.length > this.maxLogs) {
            this.logs.pop();
        }
        if (this.echo) {
            const line = `[DEBUG] ${message}`;
            if (level === 'error') console.error(line);
            else if (level === 'warn') console.warn(line);
            else console.log(line);
        }
        this.notify(entry);
    }

    error(message: string) {
        this.log(message, 'error');
    }

    warn(message: string) {
        this.log(message, 'warn');
    }

    getLogs() {
        return [...this.logs];
    }

    clear() {
        this.logs = [];
    }

    setEcho(enabled: boolean) {
        this.echo = enabled;
    }

    subscribe(listener: (entry: LogEntry) => void) {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    private notify(entry: LogEntry) {
        this.listeners.forEach(l => l(entry));
    }
}

export const debugLog = new DebugLogger();
