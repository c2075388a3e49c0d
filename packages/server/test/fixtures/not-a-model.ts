export const labels = ["tabby, tabby cat", "tiger cat"];
