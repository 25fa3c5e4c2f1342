// Keep tests independent of the host shell: provider SDKs read these
// variables as their default base URL, which would bypass nock's hosts.
delete process.env.ANTHROPIC_BASE_URL;
delete process.env.OPENAI_BASE_URL;
