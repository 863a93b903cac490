import { parseSource } from "../source"

describe("parseSource", () => {
  it.each(["http://cfg.test/app", "https://cfg.test/app?env=dev", "HTTPS://cfg.test"])(
    "routes %s to HTTP",
    (source) => {
      expect(parseSource(source)).toEqual({ kind: "http", url: source })
    },
  )

  it("reads the directory and extension from a file URL", () => {
    expect(parseSource("file:///etc/app?ext=yaml")).toEqual({
      kind: "directory",
      dir: "/etc/app",
      ext: "yaml",
    })
  })

  it("leaves the extension to the content type when not given", () => {
    expect(parseSource("file:///etc/app")).toEqual({ kind: "directory", dir: "/etc/app" })
  })

  it("decodes the path and drops a leading dot from the extension", () => {
    expect(parseSource("file:///srv/my%20app?ext=.toml")).toEqual({
      kind: "directory",
      dir: "/srv/my app",
      ext: "toml",
    })
  })

  it("resolves plain paths against cwd", () => {
    expect(parseSource("./config", "/srv/app")).toEqual({
      kind: "directory",
      dir: "/srv/app/config",
    })
    expect(parseSource("/etc/app", "/srv/app")).toEqual({ kind: "directory", dir: "/etc/app" })
  })

  it.each(["", "   ", "ftp://cfg.test/app"])("rejects %j", (source) => {
    expect(() => parseSource(source)).toThrow(
      expect.objectContaining({ code: "invalid_source" }),
    )
  })
})
