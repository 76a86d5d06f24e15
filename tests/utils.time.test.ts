import { expect } from "chai";

import { formatLocalDate, formatLocalStamp } from "../src/utils/time.js";

describe("utils/time", () => {
  it("formats local dates and stamps with zero padding", () => {
    const date = new Date(2015, 0, 5, 9, 3, 7);

    expect(formatLocalDate(date)).to.equal("2015-01-05");
    expect(formatLocalStamp(date)).to.equal("20150105-090307");
  });
});
