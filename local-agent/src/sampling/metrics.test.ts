import { describe, it, expect } from "vitest";
import { countDevicePartitions, cpuPercentBetween, estimateSystemPower, parseDiskstats, round2 } from "./metrics.js";

describe("parseDiskstats", () => {
  it("sums whole disks and skips partitions and loop devices", () => {
    const content = [
      "   8       0 sda 100 0 2048 0 50 0 4096 0 0 0 0",
      "   8       1 sda1 90 0 1024 0 40 0 2048 0 0 0 0",
      " 259       0 nvme0n1 10 0 1024 0 5 0 1024 0 0 0 0",
      " 259       1 nvme0n1p1 10 0 512 0 5 0 512 0 0 0 0",
      "   7       0 loop0 10 0 999 0 0 0 0 0 0 0 0",
    ].join("\n");
    expect(parseDiskstats(content)).toEqual({ readBytes: (2048 + 1024) * 512, writeBytes: (4096 + 1024) * 512 });
  });
});

describe("cpuPercentBetween", () => {
  it("derives utilisation from idle and total deltas", () => {
    expect(cpuPercentBetween({ idle: 1000, total: 2000 }, { idle: 1075, total: 2100 })).toBe(25);
  });

  it("returns 0 when no time passed", () => {
    expect(cpuPercentBetween({ idle: 5, total: 10 }, { idle: 5, total: 10 })).toBe(0);
  });
});

describe("estimateSystemPower", () => {
  it("adds cpu, gpu and a tenth of memory", () => {
    expect(estimateSystemPower(12.5, 80, 1000)).toBe(192.5);
  });
});

describe("round2", () => {
  it("rounds to two decimals", () => {
    expect(round2(1.23456)).toBe(1.23);
    expect(round2(9.999)).toBe(10);
  });
});

describe("countDevicePartitions", () => {
  it("counts /dev/ mounts in /proc/mounts", () => {
    const mounts = [
      "/dev/nvme0n1p2 / ext4 rw,relatime 0 0",
      "proc /proc proc rw,nosuid 0 0",
      "tmpfs /run tmpfs rw,nosuid 0 0",
      "/dev/nvme0n1p1 /boot/efi vfat rw 0 0",
      "",
    ].join("\n");
    expect(countDevicePartitions(mounts)).toBe(2);
  });

  it("counts /dev/ sources in df -P output and skips the header", () => {
    const df = [
      "Filesystem     512-blocks      Used Available Capacity  Mounted on",
      "/dev/disk3s1s1  965595304  20000000 600000000     4%    /",
      "devfs                 400       400         0   100%    /dev",
      "/dev/disk3s5    965595304 300000000 600000000    34%    /System/Volumes/Data",
    ].join("\n");
    expect(countDevicePartitions(df)).toBe(2);
  });
});
