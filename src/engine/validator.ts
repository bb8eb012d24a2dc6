// Checks that work on a bare assignment (assignment[row] = col) and share
// nothing with BoardState's incremental counters.

function inRange(col: number, n: number): boolean {
  return Number.isInteger(col) && col >= 0 && col < n;
}

/**
 * True when no two queens share a column or a diagonal. Entries outside
 * [0, n) and the empty board are never solutions.
 */
export function isSolution(assignment: ArrayLike<number>): boolean {
  const n = assignment.length;
  if (n === 0) return false;

  const columns = new Set<number>();
  const majors = new Set<number>();
  const minors = new Set<number>();
  for (let row = 0; row < n; row++) {
    const col = assignment[row];
    if (!inRange(col, n)) return false;
    columns.add(col);
    majors.add(row - col);
    minors.add(row + col);
  }

  return columns.size === n && majors.size === n && minors.size === n;
}

// Rows sharing a line with some other row, recounted from scratch. O(n).
export function conflictedRows(assignment: ArrayLike<number>): number[] {
  const n = assignment.length;
  const cols = new Int32Array(n);
  const majors = new Int32Array(Math.max(0, 2 * n - 1));
  const minors = new Int32Array(Math.max(0, 2 * n - 1));

  for (let row = 0; row < n; row++) {
    const col = assignment[row];
    if (!inRange(col, n)) {
      throw new RangeError(`Row ${row} holds column ${col}, outside [0, ${n}).`);
    }
    cols[col]++;
    majors[row - col + n - 1]++;
    minors[row + col]++;
  }

  const rows: number[] = [];
  for (let row = 0; row < n; row++) {
    const col = assignment[row];
    if (cols[col] > 1 || majors[row - col + n - 1] > 1 || minors[row + col] > 1) rows.push(row);
  }
  return rows;
}

/** Queens (other than row's own) attacking the square (row, col). */
export function countAttackers(assignment: ArrayLike<number>, row: number, col: number): number {
  let count = 0;
  for (let r = 0; r < assignment.length; r++) {
    if (r === row) continue;
    const c = assignment[r];
    if (c === col) count++;
    if (r - c === row - col) count++;
    if (r + c === row + col) count++;
  }
  return count;
}
