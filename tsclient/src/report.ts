import type { VotingSession } from './codec';

export interface TallyRow {
    option: string;
    votes: bigint;
}

export interface TallyReport {
    question: string;
    rows: TallyRow[];
    totalVotes: bigint;
}

export function buildTallyReport(session: VotingSession): TallyReport {
    return {
        question: session.question,
        rows: session.options.map((option, i) => ({ option, votes: session.votes[i] ?? 0n })),
        totalVotes: session.totalVotes
    };
}

export function formatTallyReport(report: TallyReport): string[] {
    return [
        `Question: ${report.question}`,
        ...report.rows.map(row => `${row.option} = ${row.votes}`),
        `Total: ${report.totalVotes}`
    ];
}
