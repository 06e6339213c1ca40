import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    // 文件轮转测试依赖独立的临时目录，用 forks 隔离进程级状态（注册表、诊断输出）
    pool: "forks",
  },
});
