// Served when the maintenance document cannot be read from S3. Only
// placeholders that substitutePlaceholders resolves may appear here.
export const FALLBACK_MAINTENANCE_PAGE = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>Maintenance</title>
  <style>
    body {
      font-family: Arial, sans-serif;
      text-align: center;
      padding: 50px;
      background-color: #f5f5f5;
    }
    .container {
      max-width: 600px;
      margin: 0 auto;
      background-color: white;
      padding: 40px;
      border-radius: 10px;
      box-shadow: 0 2px 10px rgba(0, 0, 0, 0.1);
    }
    h1 {
      color: #333;
    }
    p {
      color: #666;
      line-height: 1.6;
    }
    .reference {
      font-size: 12px;
      color: #999;
    }
  </style>
</head>
<body>
  <div class="container">
    <h1>Maintenance in Progress</h1>
    <p>We're currently performing scheduled maintenance to improve our service.</p>
    <p>Please check back soon. We apologize for any inconvenience.</p>
    <p class="reference">Reference: {{REQUEST_ID}} &middot; {{TIMESTAMP}}</p>
  </div>
</body>
</html>
`;
