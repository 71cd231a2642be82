import rateLimit from "express-rate-limit";

// Detection runs are CPU heavy (O(n²) pairs) and may call the judgment
// service, so the API is throttled per IP: 30 requests per 15 minutes.
export const standardRateLimiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 30, // Limit each IP to 30 requests per `window`
    standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
    legacyHeaders: false, // Disable the `X-RateLimit-*` headers
    message: {
        message: "Too many requests from this IP, please try again after 15 minutes",
    },
});
