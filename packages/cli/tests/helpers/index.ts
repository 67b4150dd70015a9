export * from "@/tests/helpers/branded"
export * from "@/tests/helpers/fakes"
export * from "@/tests/helpers/fs"
