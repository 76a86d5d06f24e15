/**
 * Line-oriented diff used to explain why an existing run script was rejected.
 * Lines are prefixed with two characters: `"  "` (unchanged), `"- "` (only in
 * the existing file) and `"+ "` (only in the expected content).
 */
export function diffLines(before: string, after: string): string[] {
  const left = splitLines(before);
  const right = splitLines(after);

  // lengths[i][j] = longest common subsequence of left[i..] and right[j..]
  const lengths: number[][] = Array.from({ length: left.length + 1 }, () => new Array<number>(right.length + 1).fill(0));
  for (let i = left.length - 1; i >= 0; i -= 1) {
    for (let j = right.length - 1; j >= 0; j -= 1) {
      lengths[i][j] = left[i] === right[j] ? lengths[i + 1][j + 1] + 1 : Math.max(lengths[i + 1][j], lengths[i][j + 1]);
    }
  }

  const output: string[] = [];
  let i = 0;
  let j = 0;
  while (i < left.length && j < right.length) {
    if (left[i] === right[j]) {
      output.push(`  ${left[i]}`);
      i += 1;
      j += 1;
    } else if (lengths[i + 1][j] >= lengths[i][j + 1]) {
      output.push(`- ${left[i]}`);
      i += 1;
    } else {
      output.push(`+ ${right[j]}`);
      j += 1;
    }
  }
  for (; i < left.length; i += 1) {
    output.push(`- ${left[i]}`);
  }
  for (; j < right.length; j += 1) {
    output.push(`+ ${right[j]}`);
  }
  return output;
}

function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}
