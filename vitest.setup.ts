// Date wire formatting depends on the local offset.
process.env.TZ = "UTC"
