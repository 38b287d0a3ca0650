export * from "./scrape-source.adapter";
