/** source <https://stackoverflow.com/a/44646838> */
export function getLengthOfLongestElement(arr: { length: number }[]) {
    return Math.max(0, ...arr.map(s => s?.length || 0));
}

export function formatTable(table: string[][], joiner = "\t"): string {
    let lengths: number[] = []

    for (let i = 0; i < getLengthOfLongestElement(table); i++) {
        lengths[i] = getLengthOfLongestElement(
            table.map(r => r[i] ?? "")
        );
    }

    return table.map((row) => (
        row.map((s, i) => (s || "").padEnd(lengths[i], " ")).join(joiner).trimEnd()
    )).join("\n");
}
